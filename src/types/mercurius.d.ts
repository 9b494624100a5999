import 'mercurius';
import { Principal } from '../interfaces/resource.js';

declare module 'mercurius' {
    interface MercuriusContext {
        principal: Principal;
        /** Aborted when the client disconnects before the reply is sent. */
        signal: AbortSignal;
    }
}
