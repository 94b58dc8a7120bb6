import { z } from "zod";

// ============================================================================
// DESTINATIONS
// ============================================================================

export interface Destination {
  name: string;
  // "lat,lon" or a provider stop id; never interpreted here
  locationToken: string;
}

export interface Coordinates {
  lat: number;
  lon: number;
}

// ============================================================================
// JOURNEYS
// ============================================================================

/** [lat, lon] */
export type PathPoint = [number, number];

export interface Leg {
  mode: string;
  durationMinutes: number;
  from: string;
  to: string;
  instruction?: string;
  path: PathPoint[];
}

interface JourneyFound {
  destinationName: string;
  durationMinutes: number;
  summary: string;
  legs: Leg[];
  error?: never;
}

interface JourneyFailed {
  destinationName: string;
  durationMinutes?: never;
  summary: "";
  legs?: never;
  error: string;
}

interface NoJourneyFound {
  destinationName: string;
  durationMinutes?: never;
  summary: "";
  legs?: never;
  error?: never;
}

/**
 * Outcome for one destination. A destination either has a best itinerary,
 * an error, or neither (the provider answered with no journeys).
 */
export type JourneyResult = JourneyFound | JourneyFailed | NoJourneyFound;

export function journeyFound(
  destinationName: string,
  durationMinutes: number,
  legs: Leg[],
  summary: string
): JourneyResult {
  return { destinationName, durationMinutes, summary, legs };
}

export function journeyFailed(destinationName: string, error: string): JourneyResult {
  return { destinationName, summary: "", error };
}

export function noJourneyFound(destinationName: string): JourneyResult {
  return { destinationName, summary: "" };
}

// ============================================================================
// API
// ============================================================================

// Blank form fields arrive as "", treat them as not supplied
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

export const searchQuerySchema = z.object({
  postcode: z.string({ required_error: "Please enter a postcode." }).trim().min(1, "Please enter a postcode."),
  date: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .regex(/^\d{4}-?\d{2}-?\d{2}$/, "Date must be YYYYMMDD or YYYY-MM-DD")
      .transform((value) => value.replace(/-/g, ""))
      .optional()
  ),
  time: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .regex(/^\d{2}:?\d{2}$/, "Time must be HHmm or HH:mm")
      .transform((value) => value.replace(":", ""))
      .optional()
  ),
});

export interface SearchResponse {
  postcode: string;
  origin: Coordinates;
  results: JourneyResult[];
}
