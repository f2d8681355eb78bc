import { AuthenticationError, SessionExpiredError, errorMessage } from "../core/errors";
import type { Logger, MetricsRegistry } from "../observability";
import type { Credentials } from "../types";
import type { SessionCapability } from "./types";

export type AuthState = "unauthenticated" | "authenticating" | "authenticated" | "expired";

export interface SessionStateDeps {
  session: SessionCapability;
  credentials: Credentials;
  logger: Logger;
  metrics?: MetricsRegistry;
  /** Consecutive expiries tolerated without a successful fetch in between. */
  maxReauthentications: number;
}

/**
 * Authentication lifecycle of one session. Expiry always routes back through a
 * fresh login before work resumes; login rejections are never retried.
 */
export class SessionState {
  private current: AuthState = "unauthenticated";
  private consecutiveExpiries = 0;
  private inflight?: Promise<void>;
  private readonly deps: SessionStateDeps;

  constructor(deps: SessionStateDeps) {
    this.deps = deps;
  }

  get state(): AuthState {
    return this.current;
  }

  async ensureAuthenticated(): Promise<void> {
    if (this.current === "authenticated") {
      return;
    }
    if (!this.inflight) {
      this.inflight = this.login().finally(() => {
        this.inflight = undefined;
      });
    }
    await this.inflight;
  }

  /** Called when a fetch signalled an auth-required response. */
  markExpired(cause?: unknown): void {
    this.consecutiveExpiries += 1;
    this.current = "expired";

    if (this.consecutiveExpiries > this.deps.maxReauthentications) {
      throw new SessionExpiredError(
        `session expired ${this.consecutiveExpiries} times in a row; giving up after ${this.deps.maxReauthentications} re-authentication(s)`,
        { cause, fatal: true },
      );
    }

    this.deps.metrics?.incrementCounter("reauthentications", 1);
    this.deps.logger.warn("session_expired", {
      consecutiveExpiries: this.consecutiveExpiries,
      error: cause === undefined ? undefined : errorMessage(cause),
    });
  }

  /** A request went through, so earlier expiries no longer count as repeated. */
  markHealthy(): void {
    this.consecutiveExpiries = 0;
  }

  private async login(): Promise<void> {
    const previous = this.current;
    this.current = "authenticating";
    this.deps.logger.info(previous === "expired" ? "session_reauthenticate" : "session_login", {
      username: this.deps.credentials.username,
    });

    try {
      await this.deps.session.login(this.deps.credentials);
    } catch (error) {
      this.current = "unauthenticated";
      if (error instanceof AuthenticationError) {
        this.deps.logger.error("session_login_rejected", { error: error.message });
      }
      throw error;
    }

    this.current = "authenticated";
    this.deps.logger.info("session_authenticated");
  }
}
