import { v7 as uuidv7 } from "uuid";

export { uuidv7 };

const VALID_ID_PART = /^[a-z0-9]+$/;

const MAX_ID_PART_LENGTH = 64;

function validateIdPart(part: string, name: string): void {
  if (!part) {
    throw new Error(`${name} cannot be empty`);
  }
  if (!VALID_ID_PART.test(part)) {
    throw new Error(
      `Invalid ${name}: "${part}". Must contain only lowercase letters and numbers.`
    );
  }
  if (part.length > MAX_ID_PART_LENGTH) {
    throw new Error(`${name} too long: "${part}" (${part.length} chars). Maximum is ${MAX_ID_PART_LENGTH}.`);
  }
}

/**
 * Time-ordered id of the form `{context}_{type}_{uuidv7}`.
 *
 * @example
 * ```typescript
 * generateId("bus", "event"); // "bus_event_0190a6f2-..."
 * ```
 */
export function generateId(context: string, type: string): string {
  validateIdPart(context, "context");
  validateIdPart(type, "type");
  return `${context}_${type}_${uuidv7()}`;
}
