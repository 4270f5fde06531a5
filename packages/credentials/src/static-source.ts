import { Credential } from "@speech-gateway/shared-types";
import type { CredentialSource } from "./source.js";

/** Fixed token, re-issued with a fresh expiry on every fetch. Used with the fake adapter. */
export class StaticCredentialSource implements CredentialSource {
  readonly name = "static";

  private readonly token: string;
  private readonly ttlMs: number;

  constructor(token: string, ttlMs = 3_600_000) {
    this.token = token;
    this.ttlMs = ttlMs;
  }

  async fetchCredential(): Promise<Credential> {
    return new Credential(this.token, Date.now() + this.ttlMs, this.name);
  }
}
