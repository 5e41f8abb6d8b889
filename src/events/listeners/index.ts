/**
 * Listener modules subscribe to their hooks as a side effect of being imported.
 * `src/index.ts` imports this file before the client starts.
 */
import "./activity";
