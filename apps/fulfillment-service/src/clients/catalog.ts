import { z } from "zod";
import type {
  FulfillmentOrder,
  VendorAvailability,
  VendorCandidate,
  VendorCatalog,
} from "@orderflow/core";
import { discardBody, readJson, sendJson, unexpectedStatus } from "./http.js";

const VendorCandidateSchema = z.object({
  vendorId: z.string().min(1),
  locationId: z.string().min(1),
  distanceKm: z.number().nonnegative(),
  unitPrice: z.number().nonnegative(),
  deliveryFee: z.number().nonnegative().default(0),
  surcharge: z.number().nonnegative().default(0),
  estimatedDeliveryHours: z.number().nonnegative(),
  rating: z.number().min(0).max(5),
  availableQuantity: z.number().int().nonnegative(),
});

const CandidatesResponseSchema = z.object({
  candidates: z.array(VendorCandidateSchema),
});

const AvailabilityResponseSchema = z.object({
  available: z.boolean(),
  capacityInfo: z.string().optional(),
});

/**
 * Query string for the candidate lookup. Items are `productId:size:quantity`.
 */
export function candidateQuery(order: FulfillmentOrder): string {
  const params = new URLSearchParams({
    orderId: order.orderId,
    latitude: String(order.delivery.latitude),
    longitude: String(order.delivery.longitude),
  });
  for (const line of order.lines) {
    params.append("item", `${line.productId}:${line.size}:${line.quantity}`);
  }
  return params.toString();
}

/**
 * Vendor catalog over HTTP: `GET /vendors/candidates` and
 * `GET /vendors/{id}/availability`.
 */
export class HttpVendorCatalog implements VendorCatalog {
  constructor(private readonly baseUrl: string) {}

  async findCandidates(order: FulfillmentOrder, signal: AbortSignal): Promise<VendorCandidate[]> {
    const response = await sendJson({
      method: "GET",
      url: `${this.baseUrl}/vendors/candidates?${candidateQuery(order)}`,
      signal,
    });
    if (!response.ok) {
      return unexpectedStatus("catalog candidates", response);
    }
    const body = await readJson(response, CandidatesResponseSchema, "catalog candidates");
    return body.candidates;
  }

  async getAvailability(vendorId: string, signal: AbortSignal): Promise<VendorAvailability> {
    const response = await sendJson({
      method: "GET",
      url: `${this.baseUrl}/vendors/${encodeURIComponent(vendorId)}/availability`,
      signal,
    });
    if (response.status === 404) {
      await discardBody(response);
      return { available: false, capacityInfo: "unknown vendor" };
    }
    if (!response.ok) {
      return unexpectedStatus("catalog availability", response);
    }
    return readJson(response, AvailabilityResponseSchema, "catalog availability");
  }
}
