import { ConfigurationError } from "@orderflow/core";

export type BrokerEndpoint =
  | { kind: "memory"; name: string }
  | { kind: "sqs"; queueUrl: string; region: string };

const SQS_HOST = /^sqs\.([a-z0-9-]+)\.amazonaws\.com$/;

/**
 * Parse `BROKER_URL`.
 *
 * - `memory://<name>` selects the in-process broker
 * - `https://sqs.<region>.amazonaws.com/<account>/<queue>` selects SQS
 *
 * @throws ConfigurationError for malformed URLs and unsupported schemes
 */
export function parseBrokerUrl(raw: string): BrokerEndpoint {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new ConfigurationError([`BROKER_URL: "${raw}" is not a valid URL`]);
  }

  if (url.protocol === "memory:") {
    return { kind: "memory", name: url.hostname || "default" };
  }

  if (url.protocol === "https:") {
    const match = SQS_HOST.exec(url.hostname);
    const region = match?.[1];
    if (!region || url.pathname.split("/").filter(Boolean).length !== 2) {
      throw new ConfigurationError([
        `BROKER_URL: "${raw}" is not an SQS queue URL (https://sqs.<region>.amazonaws.com/<account>/<queue>)`,
      ]);
    }
    return { kind: "sqs", queueUrl: `${url.origin}${url.pathname}`, region };
  }

  throw new ConfigurationError([
    `BROKER_URL: unsupported scheme "${url.protocol.replace(/:$/, "")}" (expected memory or https SQS queue URL)`,
  ]);
}
