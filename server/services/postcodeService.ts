/**
 * Postcode Service - UK postcode to coordinates via postcodes.io
 *
 * Returns null when the postcode is unknown so the route can answer 400;
 * transport and shape failures throw.
 */

import { z } from "zod";
import type { Coordinates } from "@shared/schema";
import { config } from "../config";

const postcodeLookupSchema = z.object({
  result: z.object({
    latitude: z.number(),
    longitude: z.number(),
  }),
});

export async function geocodePostcode(
  postcode: string,
  options: { signal?: AbortSignal } = {}
): Promise<Coordinates | null> {
  const baseUrl = config.POSTCODES_API_BASE_URL.replace(/\/+$/, "");
  const encoded = encodeURIComponent(postcode.trim());

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.PROVIDER_TIMEOUT_MS);
  const forwardAbort = () => controller.abort(options.signal?.reason);
  options.signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await fetch(`${baseUrl}/postcodes/${encoded}`, {
      headers: { Accept: "application/json" },
      signal: controller.signal,
    });

    if (!response.ok) {
      console.warn(`[Postcodes] Lookup for "${postcode}" returned ${response.status}`);
      return null;
    }

    const { result } = postcodeLookupSchema.parse(await response.json());
    console.log(`[Postcodes] ${postcode} → ${result.latitude},${result.longitude}`);
    return { lat: result.latitude, lon: result.longitude };
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}
