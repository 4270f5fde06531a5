/**
 * Google service-account credential source.
 *
 * Reads the service-account JSON named by GOOGLE_CREDENTIALS_FILE and mints
 * an OAuth access token for the cloud-platform scope via google-auth-library.
 */

import { readFile } from "node:fs/promises";
import { JWT } from "google-auth-library";
import {
  Credential,
  CredentialError,
  ErrorCodes,
} from "@speech-gateway/shared-types";
import type { CredentialSource } from "./source.js";

export const GOOGLE_CLOUD_SCOPE = "https://www.googleapis.com/auth/cloud-platform";

/** Token lifetime assumed when the token endpoint reports none. */
const DEFAULT_TOKEN_TTL_MS = 3_600_000;

/** The service-account fields the token exchange needs. */
export interface ServiceAccountKey {
  readonly type: "service_account";
  readonly client_email: string;
  readonly private_key: string;
  readonly project_id?: string | undefined;
}

/** Result of a token exchange, as google-auth-library reports it. */
export interface AccessTokenResult {
  access_token?: string | null;
  expiry_date?: number | null;
}

export interface AccessTokenClient {
  authorize(): Promise<AccessTokenResult>;
}

export type AccessTokenClientFactory = (key: ServiceAccountKey) => AccessTokenClient;

const defaultClientFactory: AccessTokenClientFactory = (key) =>
  new JWT({
    email: key.client_email,
    key: key.private_key,
    scopes: [GOOGLE_CLOUD_SCOPE],
  });

export class GoogleServiceAccountSource implements CredentialSource {
  readonly name = "google-service-account";

  private readonly filePath: string;
  private readonly createClient: AccessTokenClientFactory;

  constructor(filePath: string, createClient: AccessTokenClientFactory = defaultClientFactory) {
    this.filePath = filePath;
    this.createClient = createClient;
  }

  async fetchCredential(signal: AbortSignal): Promise<Credential> {
    const key = await this.readKey(signal);

    let result: AccessTokenResult;
    try {
      result = await this.createClient(key).authorize();
    } catch (err) {
      const status = httpStatusOf(err);
      const rejected = status === 400 || status === 401 || status === 403;
      throw new CredentialError(
        rejected ? ErrorCodes.CREDENTIAL_REJECTED : ErrorCodes.CREDENTIAL_UNAVAILABLE,
        rejected
          ? "The speech service credential was rejected."
          : "Could not obtain a speech service credential.",
        {
          detail: `Google token exchange for ${key.client_email} failed: ${err instanceof Error ? err.message : String(err)}`,
          cause: err,
        },
      );
    }

    if (!result.access_token) {
      throw new CredentialError(
        ErrorCodes.CREDENTIAL_UNAVAILABLE,
        "Could not obtain a speech service credential.",
        { detail: "Google token exchange returned no access_token" },
      );
    }

    const expiresAt = result.expiry_date ?? Date.now() + DEFAULT_TOKEN_TTL_MS;
    return new Credential(result.access_token, expiresAt, this.name);
  }

  /** Read and validate the service-account file. */
  private async readKey(signal: AbortSignal): Promise<ServiceAccountKey> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, { encoding: "utf8", signal });
    } catch (err) {
      throw new CredentialError(
        ErrorCodes.CREDENTIAL_MISSING,
        "The speech service credential file could not be read.",
        { detail: `${this.filePath}: ${err instanceof Error ? err.message : String(err)}`, cause: err },
      );
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw malformed(`${this.filePath} is not valid JSON`, err);
    }

    return parseServiceAccountKey(parsed, this.filePath);
  }
}

/** Validate the shape of a parsed service-account file. */
export function parseServiceAccountKey(value: unknown, origin = "credentials"): ServiceAccountKey {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw malformed(`${origin} must contain a JSON object`);
  }

  const type = "type" in value ? value.type : undefined;
  const clientEmail = "client_email" in value ? value.client_email : undefined;
  const privateKey = "private_key" in value ? value.private_key : undefined;
  const projectId = "project_id" in value ? value.project_id : undefined;

  if (type !== "service_account") {
    throw malformed(`${origin}: "type" must be "service_account"`);
  }
  if (typeof clientEmail !== "string" || !clientEmail.includes("@")) {
    throw malformed(`${origin}: "client_email" is missing or invalid`);
  }
  if (typeof privateKey !== "string" || !privateKey.includes("PRIVATE KEY")) {
    throw malformed(`${origin}: "private_key" is missing or not a PEM key`);
  }

  return {
    type: "service_account",
    client_email: clientEmail,
    private_key: privateKey,
    project_id: typeof projectId === "string" ? projectId : undefined,
  };
}

function malformed(detail: string, cause?: unknown): CredentialError {
  return new CredentialError(
    ErrorCodes.CREDENTIAL_MALFORMED,
    "The speech service credential file is malformed.",
    { detail, cause },
  );
}

/** HTTP status of a token-endpoint failure, when the error carries one. */
function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("response" in err)) return undefined;
  const response = err.response;
  if (typeof response !== "object" || response === null || !("status" in response)) {
    return undefined;
  }
  return typeof response.status === "number" ? response.status : undefined;
}
