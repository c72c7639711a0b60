/**
 * Service configuration, read once from the environment at startup.
 *
 * Every problem is collected before failing, so one `ConfigurationError`
 * lists all of them.
 */

import { z } from "zod";
import {
  ConfigurationError,
  DEFAULT_SELECTION_WEIGHTS,
  LOG_LEVELS,
  type CircuitBreakerSettings,
  type LogLevel,
  type RetrySettings,
  type SelectionWeights,
} from "@orderflow/core";
import { parseBrokerUrl, type BrokerClientSettings, type BrokerEndpoint } from "@orderflow/bus";

export interface FulfillmentConfig {
  serviceName: string;
  port: number;
  logLevel: LogLevel;
  broker: {
    endpoint: BrokerEndpoint;
    settings: BrokerClientSettings;
  };
  circuit: CircuitBreakerSettings;
  retry: RetrySettings;
  callTimeoutMs: number;
  selectionWeights: SelectionWeights;
  reservationTtlMs: number;
  expirySweepIntervalMs: number;
  inventoryServiceUrl: string;
  catalogServiceUrl: string;
  /** Targets whose open circuit reports the service unhealthy */
  criticalTargets: string[];
  shutdownTimeoutMs: number;
}

export type Environment = Readonly<Record<string, string | undefined>>;

// Blank variables count as unset
const blankAsUnset = (value: unknown): unknown => (value === "" ? undefined : value);

const count = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().min(1).default(fallback));

const text = (fallback: string) => z.preprocess(blankAsUnset, z.string().min(1).default(fallback));

const httpUrl = z.preprocess(
  blankAsUnset,
  z
    .string({ required_error: "is required" })
    .url()
    .refine((value) => value.startsWith("http://") || value.startsWith("https://"), {
      message: "must be an http(s) URL",
    })
);

const EnvironmentSchema = z.object({
  SERVICE_NAME: text("fulfillment-service"),
  PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).max(65_535).default(8080)),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === "string" && value !== "" ? value.toUpperCase() : undefined),
    z.enum(LOG_LEVELS).default("INFO")
  ),

  BROKER_URL: z.preprocess(blankAsUnset, z.string({ required_error: "is required" })),
  BROKER_MAX_RECONNECT_ATTEMPTS: count(5),
  BROKER_BACKOFF_BASE_MS: count(1_000),
  BROKER_BACKOFF_MAX_MS: count(60_000),
  BROKER_RECOVERY_INTERVAL_MS: count(30_000),
  BROKER_CONNECT_TIMEOUT_MS: count(10_000),
  BROKER_PUBLISH_TIMEOUT_MS: count(5_000),
  BROKER_MAX_PENDING_EVENTS: count(1_000),
  BROKER_MAX_REPLAY_ATTEMPTS: count(5),

  CIRCUIT_FAILURE_THRESHOLD: count(5),
  CIRCUIT_WINDOW_MS: count(60_000),
  CIRCUIT_COOLDOWN_MS: count(60_000),
  CIRCUIT_MAX_COOLDOWN_MS: count(300_000),
  CIRCUIT_COOLDOWN_MULTIPLIER: z.preprocess(blankAsUnset, z.coerce.number().min(1).default(2)),

  RETRY_MAX_ATTEMPTS: count(3),
  RETRY_BASE_DELAY_MS: count(200),
  RETRY_MAX_DELAY_MS: count(5_000),
  CALL_TIMEOUT_MS: count(30_000),

  SELECTION_WEIGHTS: z.preprocess(blankAsUnset, z.string().optional()),
  RESERVATION_TTL_MS: count(900_000),
  EXPIRY_SWEEP_INTERVAL_MS: count(60_000),

  INVENTORY_SERVICE_URL: httpUrl,
  CATALOG_SERVICE_URL: httpUrl,
  CRITICAL_TARGETS: text("inventory"),
  SHUTDOWN_TIMEOUT_MS: count(10_000),
});

const WEIGHT_KEYS: ReadonlyArray<keyof SelectionWeights> = [
  "distance",
  "cost",
  "quality",
  "availability",
];

function isWeightKey(value: string): value is keyof SelectionWeights {
  return WEIGHT_KEYS.some((key) => key === value);
}

/**
 * Parse `distance=0.4,cost=0.3,...`. Keys left out keep their default.
 */
export function parseSelectionWeights(
  raw: string | undefined,
  issues: string[]
): SelectionWeights {
  const weights: SelectionWeights = { ...DEFAULT_SELECTION_WEIGHTS };
  if (raw === undefined) {
    return weights;
  }

  for (const pair of raw.split(",")) {
    const entry = pair.trim();
    if (entry === "") continue;

    const [key = "", value = "", ...rest] = entry.split("=").map((part) => part.trim());
    const weight = Number(value);
    if (!isWeightKey(key)) {
      issues.push(`SELECTION_WEIGHTS: unknown weight "${key}" (expected ${WEIGHT_KEYS.join(", ")})`);
    } else if (rest.length > 0 || value === "" || !Number.isFinite(weight) || weight < 0) {
      issues.push(`SELECTION_WEIGHTS: "${entry}" must be <name>=<non-negative number>`);
    } else {
      weights[key] = weight;
    }
  }

  const total = WEIGHT_KEYS.reduce((sum, key) => sum + weights[key], 0);
  if (total <= 0) {
    issues.push("SELECTION_WEIGHTS: weights must sum to a positive number");
  }
  return weights;
}

/**
 * Build the service configuration from `env`.
 *
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(env: Environment = process.env): FulfillmentConfig {
  const parsed = EnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const issues: string[] = [];

  let endpoint: BrokerEndpoint | null = null;
  try {
    endpoint = parseBrokerUrl(vars.BROKER_URL);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    issues.push(...error.issues);
  }

  const selectionWeights = parseSelectionWeights(vars.SELECTION_WEIGHTS, issues);

  if (vars.BROKER_BACKOFF_MAX_MS < vars.BROKER_BACKOFF_BASE_MS) {
    issues.push("BROKER_BACKOFF_MAX_MS: must be >= BROKER_BACKOFF_BASE_MS");
  }
  if (vars.RETRY_MAX_DELAY_MS < vars.RETRY_BASE_DELAY_MS) {
    issues.push("RETRY_MAX_DELAY_MS: must be >= RETRY_BASE_DELAY_MS");
  }
  if (vars.CIRCUIT_MAX_COOLDOWN_MS < vars.CIRCUIT_COOLDOWN_MS) {
    issues.push("CIRCUIT_MAX_COOLDOWN_MS: must be >= CIRCUIT_COOLDOWN_MS");
  }

  if (issues.length > 0 || endpoint === null) {
    throw new ConfigurationError(issues);
  }

  return {
    serviceName: vars.SERVICE_NAME,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
    broker: {
      endpoint,
      settings: {
        maxReconnectAttempts: vars.BROKER_MAX_RECONNECT_ATTEMPTS,
        backoffBaseMs: vars.BROKER_BACKOFF_BASE_MS,
        backoffMaxMs: vars.BROKER_BACKOFF_MAX_MS,
        recoveryIntervalMs: vars.BROKER_RECOVERY_INTERVAL_MS,
        connectTimeoutMs: vars.BROKER_CONNECT_TIMEOUT_MS,
        publishTimeoutMs: vars.BROKER_PUBLISH_TIMEOUT_MS,
        maxPendingEvents: vars.BROKER_MAX_PENDING_EVENTS,
        maxReplayAttempts: vars.BROKER_MAX_REPLAY_ATTEMPTS,
      },
    },
    circuit: {
      failureThreshold: vars.CIRCUIT_FAILURE_THRESHOLD,
      windowMs: vars.CIRCUIT_WINDOW_MS,
      cooldownMs: vars.CIRCUIT_COOLDOWN_MS,
      maxCooldownMs: vars.CIRCUIT_MAX_COOLDOWN_MS,
      cooldownMultiplier: vars.CIRCUIT_COOLDOWN_MULTIPLIER,
    },
    retry: {
      maxAttempts: vars.RETRY_MAX_ATTEMPTS,
      baseDelayMs: vars.RETRY_BASE_DELAY_MS,
      maxDelayMs: vars.RETRY_MAX_DELAY_MS,
    },
    callTimeoutMs: vars.CALL_TIMEOUT_MS,
    selectionWeights,
    reservationTtlMs: vars.RESERVATION_TTL_MS,
    expirySweepIntervalMs: vars.EXPIRY_SWEEP_INTERVAL_MS,
    inventoryServiceUrl: stripTrailingSlash(vars.INVENTORY_SERVICE_URL),
    catalogServiceUrl: stripTrailingSlash(vars.CATALOG_SERVICE_URL),
    criticalTargets: vars.CRITICAL_TARGETS.split(",")
      .map((target) => target.trim())
      .filter((target) => target !== ""),
    shutdownTimeoutMs: vars.SHUTDOWN_TIMEOUT_MS,
  };
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}
