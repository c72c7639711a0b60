/**
 * Amazon SQS transport.
 *
 * One queue carries every event type; the type travels as the `eventType`
 * message attribute. `connect` checks the queue with `GetQueueAttributes`.
 * Consumption uses `sqs-consumer`, which processes one message at a time and
 * deletes it only when the handler resolves.
 */

import {
  GetQueueAttributesCommand,
  SQSClient,
  SendMessageCommand,
  type Message,
  type MessageAttributeValue,
} from "@aws-sdk/client-sqs";
import { Consumer } from "sqs-consumer";
import { createNoOpLogger, describeError, type Logger } from "@orderflow/core";
import type { BrokerMessage, BrokerTransport, MessageHandler } from "../types.js";

export const EVENT_TYPE_ATTRIBUTE = "eventType";

export interface SqsTransportOptions {
  queueUrl: string;
  region?: string | undefined;
  /** Injected client; created from `region` when absent */
  client?: SQSClient | undefined;
  /** Long-poll wait, seconds */
  waitTimeSeconds?: number | undefined;
  logger?: Logger | undefined;
}

export function encodeSqsMessage(message: BrokerMessage): {
  MessageBody: string;
  MessageAttributes: Record<string, MessageAttributeValue>;
} {
  return {
    MessageBody: message.body,
    MessageAttributes: {
      [EVENT_TYPE_ATTRIBUTE]: { DataType: "String", StringValue: message.eventType },
    },
  };
}

/**
 * Recover the broker message from an SQS message. Falls back to the envelope's
 * `eventType` when the attribute is missing (e.g. a message sent by hand).
 */
export function decodeSqsMessage(message: Message): BrokerMessage | null {
  const body = message.Body;
  if (body === undefined || body.length === 0) {
    return null;
  }

  const attribute = message.MessageAttributes?.[EVENT_TYPE_ATTRIBUTE]?.StringValue;
  if (attribute) {
    return { eventType: attribute, body };
  }

  try {
    const parsed: unknown = JSON.parse(body);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "eventType" in parsed &&
      typeof parsed.eventType === "string"
    ) {
      return { eventType: parsed.eventType, body };
    }
  } catch {
    return null;
  }
  return null;
}

export class SqsBrokerTransport implements BrokerTransport {
  readonly name = "sqs";
  private readonly queueUrl: string;
  private readonly client: SQSClient;
  private readonly waitTimeSeconds: number;
  private readonly logger: Logger;
  private readonly lostListeners = new Set<(error: Error) => void>();
  private consumer: Consumer | null = null;

  constructor(options: SqsTransportOptions) {
    this.queueUrl = options.queueUrl;
    this.client =
      options.client ?? new SQSClient(options.region !== undefined ? { region: options.region } : {});
    this.waitTimeSeconds = options.waitTimeSeconds ?? 20;
    this.logger = options.logger ?? createNoOpLogger();
  }

  async connect(): Promise<void> {
    await this.client.send(
      new GetQueueAttributesCommand({ QueueUrl: this.queueUrl, AttributeNames: ["QueueArn"] })
    );
  }

  async publish(message: BrokerMessage): Promise<void> {
    await this.client.send(new SendMessageCommand({ QueueUrl: this.queueUrl, ...encodeSqsMessage(message) }));
  }

  consume(eventTypes: readonly string[], handler: MessageHandler): Promise<void> {
    this.stopConsumer();
    const bound = new Set(eventTypes);

    const consumer = Consumer.create({
      queueUrl: this.queueUrl,
      sqs: this.client,
      messageAttributeNames: [EVENT_TYPE_ATTRIBUTE],
      waitTimeSeconds: this.waitTimeSeconds,
      batchSize: 1,
      handleMessage: async (sqsMessage: Message): Promise<Message> => {
        const decoded = decodeSqsMessage(sqsMessage);
        if (!decoded) {
          this.logger.warn("Deleting SQS message without a usable body", {
            messageId: sqsMessage.MessageId,
          });
          return sqsMessage;
        }
        if (!bound.has(decoded.eventType)) {
          this.logger.debug("Ignoring unbound event type", { eventType: decoded.eventType });
          return sqsMessage;
        }
        await handler(decoded);
        return sqsMessage;
      },
    });

    consumer.on("error", (error) => {
      this.logger.warn("SQS receive failed", { error: describeError(error) });
      this.stopConsumer();
      for (const listener of this.lostListeners) {
        listener(error);
      }
    });
    consumer.on("processing_error", (error) => {
      this.logger.debug("SQS message left for redelivery", { error: describeError(error) });
    });

    consumer.start();
    this.consumer = consumer;
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.stopConsumer();
    return Promise.resolve();
  }

  onConnectionLost(listener: (error: Error) => void): () => void {
    this.lostListeners.add(listener);
    return () => {
      this.lostListeners.delete(listener);
    };
  }

  private stopConsumer(): void {
    if (this.consumer) {
      this.consumer.stop();
      this.consumer = null;
    }
  }
}
