/**
 * Cached credential provider with single-flight refresh.
 *
 * - a cached credential outside the refresh-ahead window is returned as is
 * - inside the window but unexpired, it is returned immediately and one
 *   background refresh starts
 * - expired or absent, callers wait on the one shared refresh
 *
 * Each refresh is bounded by `timeoutMs`. The in-flight slot is cleared
 * whatever the outcome, and a caller's abort only ends that caller's wait.
 */

import type { Credential } from "@speech-gateway/shared-types";
import {
  CredentialError,
  ErrorCodes,
  GatewayError,
  RequestCancelledError,
} from "@speech-gateway/shared-types";
import type { Logger } from "@speech-gateway/logging";
import type { CredentialSource } from "./source.js";

export interface CachedCredentialOptions {
  /** Refresh this long before expiry. */
  readonly refreshAheadMs: number;
  /** Bound on a single refresh. */
  readonly timeoutMs: number;
  /** Clock, injectable for tests. */
  readonly now: () => number;
}

const DEFAULTS: CachedCredentialOptions = {
  refreshAheadMs: 60_000,
  timeoutMs: 10_000,
  now: Date.now,
};

export interface CredentialHealth {
  readonly healthy: boolean;
  readonly message: string;
}

/** What the gateway needs from a credential provider. */
export interface CredentialProvider {
  getCredential(signal?: AbortSignal): Promise<Credential>;
  invalidate(): void;
  checkHealth(): Promise<CredentialHealth>;
}

export class CachedCredentialProvider implements CredentialProvider {
  private readonly source: CredentialSource;
  private readonly options: CachedCredentialOptions;
  private readonly log: Logger;
  private cached: Credential | undefined;
  private inflight: Promise<Credential> | undefined;
  private refreshCount = 0;

  constructor(
    source: CredentialSource,
    logger: Logger,
    options?: Partial<CachedCredentialOptions>,
  ) {
    this.source = source;
    this.options = { ...DEFAULTS, ...options };
    this.log = logger.child({ component: "credentials", source: source.name });
  }

  /** Number of refreshes started so far. */
  get refreshes(): number {
    return this.refreshCount;
  }

  /** Whether a refresh is currently in flight. */
  get refreshing(): boolean {
    return this.inflight !== undefined;
  }

  async getCredential(signal?: AbortSignal): Promise<Credential> {
    if (signal?.aborted) throw cancelled();

    const now = this.options.now();
    const cached = this.cached;

    if (cached && !cached.expiresWithin(this.options.refreshAheadMs, now)) {
      return cached;
    }

    if (cached && !cached.isExpired(now)) {
      // Last-known-valid: serve it while a refresh runs.
      void this.refresh();
      return cached;
    }

    return this.waitFor(this.refresh(), signal);
  }

  /** Drop the cached credential, e.g. after the vendor refused it. */
  invalidate(): void {
    if (this.cached) {
      this.log.warn("Credential invalidated", { expiresAt: new Date(this.cached.expiresAt).toISOString() });
    }
    this.cached = undefined;
  }

  /** Readiness check: can a credential be obtained right now? */
  async checkHealth(): Promise<CredentialHealth> {
    try {
      const credential = await this.getCredential();
      return {
        healthy: true,
        message: `Credential valid until ${new Date(credential.expiresAt).toISOString()}`,
      };
    } catch (err) {
      return {
        healthy: false,
        message: err instanceof Error ? err.message : String(err),
      };
    }
  }

  /** Start a refresh, or join the one in flight. */
  private refresh(): Promise<Credential> {
    if (this.inflight) return this.inflight;

    this.refreshCount++;
    const startMs = Date.now();
    const controller = new AbortController();

    const refresh = this.bounded(this.source.fetchCredential(controller.signal), controller)
      .then((credential) => {
        this.cached = credential;
        this.log.info("Credential refreshed", {
          durationMs: Date.now() - startMs,
          expiresAt: new Date(credential.expiresAt).toISOString(),
        });
        return credential;
      })
      .finally(() => {
        this.inflight = undefined;
      });

    refresh.catch((err: unknown) => {
      this.log.error("Credential refresh failed", {
        durationMs: Date.now() - startMs,
        error: err instanceof GatewayError ? err.toJSON() : String(err),
      });
    });

    this.inflight = refresh;
    return refresh;
  }

  private bounded(pending: Promise<Credential>, controller: AbortController): Promise<Credential> {
    const { timeoutMs } = this.options;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new CredentialError(
            ErrorCodes.CREDENTIAL_TIMEOUT,
            "Could not obtain a speech service credential in time.",
            { detail: `Credential refresh exceeded ${timeoutMs}ms` },
          ),
        );
      }, timeoutMs);
    });

    const normalized = pending.catch((err: unknown) => {
      throw toCredentialError(err);
    });

    return Promise.race([normalized, timeout]).finally(() => clearTimeout(timer));
  }

  private waitFor(shared: Promise<Credential>, signal?: AbortSignal): Promise<Credential> {
    if (!signal) return shared;

    return new Promise<Credential>((resolve, reject) => {
      const onAbort = (): void => reject(cancelled());
      signal.addEventListener("abort", onAbort, { once: true });
      shared.then(
        (credential) => {
          signal.removeEventListener("abort", onAbort);
          resolve(credential);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }
}

function cancelled(): RequestCancelledError {
  return new RequestCancelledError(
    ErrorCodes.CLIENT_CLOSED_REQUEST,
    "The request was cancelled by the client.",
  );
}

function toCredentialError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  return new CredentialError(
    ErrorCodes.CREDENTIAL_UNAVAILABLE,
    "Could not obtain a speech service credential.",
    { detail: err instanceof Error ? err.message : String(err), cause: err },
  );
}
