/**
 * Configuration loader — reads from environment variables.
 *
 * Runs once at startup. The returned config is deep-frozen; any problem
 * is a ConfigError and the process must not start listening.
 */

import { accessSync, constants, statSync } from "node:fs";
import type { ElevenLabsOutputFormat, SpeechGatewayConfig } from "@speech-gateway/shared-types";
import {
  ConfigError,
  ErrorCodes,
  ProviderIds,
  createProviderId,
} from "@speech-gateway/shared-types";

type Env = Record<string, string | undefined>;

const INTEGER = /^-?\d+$/;
/** Largest delay setTimeout honours; Node clamps anything above it to 1 ms. */
const MAX_TIMER_MS = 2_147_483_647;
/** Upstream and credential bounds above ten minutes are treated as typos. */
const MAX_TIMEOUT_MS = 600_000;
const MAX_RETRIES = 10;
const TRUE_VALUES: ReadonlySet<string> = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES: ReadonlySet<string> = new Set(["0", "false", "no", "off"]);

/**
 * Strict integer parse. Returns defaultVal when raw is undefined/empty.
 * Throws ConfigError(INVALID_CONFIG) for anything that is not a plain integer
 * or that exceeds `max`.
 */
function safeParseInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
  max: number = MAX_TIMER_MS,
): number {
  if (raw === undefined || raw.trim() === "") return defaultVal;
  if (!INTEGER.test(raw.trim())) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `Invalid integer for ${fieldName}`,
      { detail: `Got "${raw}"` },
    );
  }
  const value = parseInt(raw, 10);
  if (value > max) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, `${fieldName} must be at most ${max}`, {
      detail: `Got ${raw.trim()}`,
    });
  }
  return value;
}

/** Integer parse that also enforces the value is positive (> 0). */
function safeParsePositiveInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
  max?: number,
): number {
  const value = safeParseInt(raw, defaultVal, fieldName, max);
  if (value <= 0) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, `${fieldName} must be positive`, {
      detail: `Got ${value}`,
    });
  }
  return value;
}

/** Integer parse allowing zero. */
function safeParseNonNegativeInt(
  raw: string | undefined,
  defaultVal: number,
  fieldName: string,
  max?: number,
): number {
  const value = safeParseInt(raw, defaultVal, fieldName, max);
  if (value < 0) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, `${fieldName} cannot be negative`, {
      detail: `Got ${value}`,
    });
  }
  return value;
}

function parsePort(raw: string | undefined): number {
  const port = safeParseInt(raw, 8080, "PORT");
  if (port < 1 || port > 65535) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, "PORT must be between 1 and 65535", {
      detail: `Got ${port}`,
    });
  }
  return port;
}

/** Boolean-like flag: 1/0, true/false, yes/no, on/off. Empty is false. */
function parseFlag(raw: string | undefined, fieldName: string): boolean {
  const value = (raw ?? "").trim().toLowerCase();
  if (value === "" || FALSE_VALUES.has(value)) return false;
  if (TRUE_VALUES.has(value)) return true;
  throw new ConfigError(
    ErrorCodes.INVALID_CONFIG,
    `${fieldName} must be a boolean (true/false, 1/0, yes/no, on/off)`,
    { detail: `Got "${raw ?? ""}"` },
  );
}

/** The credentials file must be named and readable now, not at first request. */
function requireReadableFile(raw: string | undefined, fieldName: string): string {
  const path = raw?.trim() ?? "";
  if (path.length === 0) {
    throw new ConfigError(ErrorCodes.MISSING_CONFIG, `${fieldName} is required`, {
      detail: `${fieldName} is unset or empty`,
    });
  }
  try {
    accessSync(path, constants.R_OK);
    if (!statSync(path).isFile()) {
      throw new Error("not a regular file");
    }
  } catch (err) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, `${fieldName} is not a readable file`, {
      detail: `${path}: ${err instanceof Error ? err.message : String(err)}`,
      cause: err,
    });
  }
  return path;
}

function parseProvider(raw: string | undefined): SpeechGatewayConfig["speechProvider"] {
  try {
    return createProviderId((raw ?? "").trim() || "google");
  } catch (err) {
    throw new ConfigError(ErrorCodes.INVALID_CONFIG, "Unknown SPEECH_PROVIDER", {
      detail: err instanceof Error ? err.message : String(err),
    });
  }
}

const ELEVENLABS_OUTPUT_FORMATS: readonly ElevenLabsOutputFormat[] = ["ulaw_8000", "pcm_16000"];

function parseElevenLabsOutputFormat(raw: string | undefined): ElevenLabsOutputFormat {
  const value = raw?.trim() ?? "";
  if (value === "") return "ulaw_8000";
  const match = ELEVENLABS_OUTPUT_FORMATS.find((format) => format === value);
  if (match === undefined) {
    throw new ConfigError(
      ErrorCodes.INVALID_CONFIG,
      `ELEVENLABS_OUTPUT_FORMAT must be one of: ${ELEVENLABS_OUTPUT_FORMATS.join(", ")}`,
      { detail: `Got "${value}"` },
    );
  }
  return match;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/** Load gateway configuration from environment variables. */
export function loadConfig(env: Env = process.env): SpeechGatewayConfig {
  const speechProvider = parseProvider(env["SPEECH_PROVIDER"]);
  const azureKey = env["AZURE_SUBSCRIPTION_KEY"]?.trim() ?? "";
  const elevenLabsKey = env["ELEVENLABS_API_KEY"]?.trim() ?? "";
  const elevenLabsVoice = env["ELEVENLABS_VOICE_ID"]?.trim() ?? "";

  if (speechProvider === ProviderIds.Azure && azureKey.length === 0) {
    throw new ConfigError(
      ErrorCodes.MISSING_CONFIG,
      "AZURE_SUBSCRIPTION_KEY is required when SPEECH_PROVIDER=azure",
    );
  }
  if (speechProvider === ProviderIds.ElevenLabs) {
    for (const [name, value] of [
      ["ELEVENLABS_API_KEY", elevenLabsKey],
      ["ELEVENLABS_VOICE_ID", elevenLabsVoice],
    ] as const) {
      if (value.length === 0) {
        throw new ConfigError(
          ErrorCodes.MISSING_CONFIG,
          `${name} is required when SPEECH_PROVIDER=elevenlabs`,
        );
      }
    }
  }

  const config: SpeechGatewayConfig = {
    credentialsFilePath: requireReadableFile(env["GOOGLE_CREDENTIALS_FILE"], "GOOGLE_CREDENTIALS_FILE"),
    loggingEnabled: parseFlag(env["AZURE_SPEECH_LOGGING_ENABLE"], "AZURE_SPEECH_LOGGING_ENABLE"),
    listenPort: parsePort(env["PORT"]),
    host: env["HOST"]?.trim() || "0.0.0.0",
    speechProvider,
    defaultLanguage: env["SPEECH_LANGUAGE"]?.trim() || "es-CO",
    corsOrigins: (env["CORS_ORIGINS"] ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
    upstream: {
      timeoutMs: safeParsePositiveInt(
        env["UPSTREAM_TIMEOUT_MS"],
        15_000,
        "UPSTREAM_TIMEOUT_MS",
        MAX_TIMEOUT_MS,
      ),
      credentialTimeoutMs: safeParsePositiveInt(
        env["CREDENTIAL_TIMEOUT_MS"],
        10_000,
        "CREDENTIAL_TIMEOUT_MS",
        MAX_TIMEOUT_MS,
      ),
      maxRetries: safeParseNonNegativeInt(
        env["UPSTREAM_MAX_RETRIES"],
        0,
        "UPSTREAM_MAX_RETRIES",
        MAX_RETRIES,
      ),
    },
    limits: {
      maxAudioBytes: safeParsePositiveInt(env["MAX_AUDIO_BYTES"], 10 * 1024 * 1024, "MAX_AUDIO_BYTES"),
      maxTextChars: safeParsePositiveInt(env["MAX_TEXT_CHARS"], 5000, "MAX_TEXT_CHARS"),
    },
    google: {
      voiceName: env["GOOGLE_TTS_VOICE"]?.trim() || undefined,
    },
    azure: {
      subscriptionKey: azureKey,
      region: env["AZURE_REGION"]?.trim() || "eastus",
      voiceName: env["AZURE_VOICE_NAME"]?.trim() || "es-CO-SalomeNeural",
    },
    elevenlabs: {
      apiKey: elevenLabsKey,
      voiceId: elevenLabsVoice,
      modelId: env["ELEVENLABS_MODEL_ID"]?.trim() || "eleven_multilingual_v2",
      outputFormat: parseElevenLabsOutputFormat(env["ELEVENLABS_OUTPUT_FORMAT"]),
    },
  };

  return deepFreeze(config);
}
