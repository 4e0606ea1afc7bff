import type { AppConfig } from '../lib/config.js';
import type { UserStore } from '../lib/user-store.js';

/** What every route handler is given besides the request and response. */
export interface RouteContext {
  config: AppConfig;
  store: UserStore;
  /** Current time in milliseconds since the epoch. */
  now: () => number;
}
