import 'fastify';
import { Principal } from '../interfaces/resource.js';

declare module 'fastify' {
    export interface FastifyRequest {
        /** Set for GraphQL requests once the bearer token, if any, is verified. */
        principal: Principal | null;
    }
}
