/**
 * Azure Speech credential source: exchanges the subscription key for a
 * short-lived bearer token at the regional issueToken endpoint.
 */

import {
  Credential,
  CredentialError,
  ErrorCodes,
} from "@speech-gateway/shared-types";
import type { CredentialSource } from "./source.js";

/** Azure issues tokens valid for ten minutes. */
export const AZURE_TOKEN_TTL_MS = 10 * 60 * 1000;

export class AzureTokenSource implements CredentialSource {
  readonly name = "azure-issue-token";

  private readonly subscriptionKey: string;
  private readonly region: string;

  constructor(subscriptionKey: string, region: string) {
    this.subscriptionKey = subscriptionKey;
    this.region = region;
  }

  async fetchCredential(signal: AbortSignal): Promise<Credential> {
    if (this.subscriptionKey.length === 0) {
      throw new CredentialError(
        ErrorCodes.CREDENTIAL_MISSING,
        "Azure subscription key not configured.",
        { detail: "AZURE_SUBSCRIPTION_KEY is empty" },
      );
    }

    const url = `https://${this.region}.api.cognitive.microsoft.com/sts/v1.0/issueToken`;
    const issuedAt = Date.now();

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Ocp-Apim-Subscription-Key": this.subscriptionKey },
        signal,
      });
    } catch (err) {
      throw new CredentialError(
        ErrorCodes.CREDENTIAL_UNAVAILABLE,
        "Could not obtain a speech service credential.",
        { detail: `Azure issueToken: ${err instanceof Error ? err.message : String(err)}`, cause: err },
      );
    }

    if (!response.ok) {
      const body = await response.text().catch(() => "");
      const rejected = response.status === 401 || response.status === 403;
      throw new CredentialError(
        rejected ? ErrorCodes.CREDENTIAL_REJECTED : ErrorCodes.CREDENTIAL_UNAVAILABLE,
        rejected
          ? "The speech service credential was rejected."
          : "Could not obtain a speech service credential.",
        { detail: `Azure issueToken HTTP ${response.status}: ${body.slice(0, 200)}` },
      );
    }

    const token = (await response.text()).trim();
    if (token.length === 0) {
      throw new CredentialError(
        ErrorCodes.CREDENTIAL_UNAVAILABLE,
        "Could not obtain a speech service credential.",
        { detail: "Azure issueToken returned an empty body" },
      );
    }

    return new Credential(token, issuedAt + AZURE_TOKEN_TTL_MS, this.name);
  }
}
