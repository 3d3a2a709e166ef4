import type { ChangeTracker, RecordStore } from '@jwp-tracker/core';
import type { AppConfig } from './config.js';
import type { Session, SessionRegistry } from './session.js';

/** Hono environment shared by every route */
export type AppEnv = {
  Variables: {
    session: Session | undefined;
  };
};

/** Collaborators the routes are built from */
export interface RouteDependencies {
  store: RecordStore;
  config: AppConfig;
  sessions: SessionRegistry;
  tracker: ChangeTracker;
}
