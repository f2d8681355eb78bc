import path from "node:path";
import type { AppConfig } from "../config";
import { ConfigError, errorMessage } from "../core/errors";
import type { Logger } from "../observability";
import { isSessionCapability, type SessionCapability } from "./types";

/** Handed to a driver's `createSession`; `index` tells parallel sessions apart. */
export interface SessionModuleContext {
  config: AppConfig;
  logger: Logger;
  index: number;
}

export type SessionFactory = (context: SessionModuleContext) => Promise<SessionCapability>;

function findCreateSession(loaded: unknown): ((context: SessionModuleContext) => unknown) | undefined {
  if (typeof loaded !== "object" || loaded === null) {
    return undefined;
  }
  if ("createSession" in loaded && typeof loaded.createSession === "function") {
    const createSession = loaded.createSession;
    return (context) => createSession(context);
  }
  if ("default" in loaded) {
    return findCreateSession(loaded.default);
  }
  return undefined;
}

/**
 * Loads the operator's browser driver. The module must export
 * `createSession(context)`, returning (or resolving to) a session capability.
 */
export async function loadSessionModule(modulePath: string): Promise<SessionFactory> {
  const resolved = path.resolve(modulePath);

  let loaded: unknown;
  try {
    loaded = await import(resolved);
  } catch (error) {
    throw new ConfigError(`cannot load session module ${resolved}: ${errorMessage(error)}`, { cause: error });
  }

  const createSession = findCreateSession(loaded);
  if (!createSession) {
    throw new ConfigError(`session module ${resolved} does not export createSession(context)`);
  }

  return async (context) => {
    const session: unknown = await createSession(context);
    if (!isSessionCapability(session)) {
      throw new ConfigError(`createSession in ${resolved} must return an object with login, listAssets and fetch`);
    }
    return session;
  };
}
