/**
 * Journey Service - Fastest public transport journey to each airport
 *
 * Sends one Journey Planner request per destination, all in flight together,
 * keeps the shortest itinerary from each answer and ranks the destinations.
 *
 * Failure rules:
 * 1. A destination's failure is reported on its own result, siblings are untouched
 * 2. A leg whose path geometry will not decode keeps an empty path
 * 3. Only cancelling the whole search rejects
 */

import { z } from "zod";
import {
  journeyFailed,
  journeyFound,
  noJourneyFound,
  type Coordinates,
  type Destination,
  type JourneyResult,
  type Leg,
  type PathPoint,
} from "@shared/schema";
import { config } from "../config";
import { getErrorMessage } from "../utils/errors";
import { AIRPORTS } from "./destinationRegistry";

// ============================================================================
// TYPES
// ============================================================================

export interface JourneySearchOptions {
  /** Provider format, yyyyMMdd */
  date?: string;
  /** Provider format, HHmm. Always sent as a departure time. */
  time?: string;
  signal?: AbortSignal;
  destinations?: readonly Destination[];
}

// Legs stay unparsed until their journey wins, so a bad leg on a slower
// journey cannot fail the destination.
const candidateJourneySchema = z.object({
  duration: z.number().int(),
  legs: z.array(z.unknown()),
});

const journeyPlannerResponseSchema = z.object({
  journeys: z.array(candidateJourneySchema),
});

const rawLegSchema = z.object({
  mode: z.object({ name: z.string() }),
  duration: z.number().int(),
  departurePoint: z.object({ commonName: z.string() }),
  arrivalPoint: z.object({ commonName: z.string() }),
  instruction: z.object({ summary: z.string().nullish() }).nullish(),
  // Decoded on its own by decodeLegPath; bad geometry must not fail the leg
  path: z.unknown().optional(),
});

const legPathSchema = z.object({ lineString: z.string().nullish() });

// lineString is itself JSON: [[lat, lon], ...]
const linePathSchema = z.array(z.tuple([z.number(), z.number()]).rest(z.number()));

// ============================================================================
// NORMALIZATION
// ============================================================================

/**
 * "night-bus" → "Night bus"
 */
export function formatModeName(mode: string): string {
  const spaced = mode.replace(/-/g, " ");
  if (spaced.length === 0) return spaced;
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export function parseLinePath(lineString: string): PathPoint[] {
  try {
    return linePathSchema
      .parse(JSON.parse(lineString))
      .map(([lat, lon]): PathPoint => [lat, lon]);
  } catch (error) {
    console.warn(`[Journeys] Could not decode leg path, leaving it empty: ${getErrorMessage(error)}`);
    return [];
  }
}

/**
 * Path geometry of a raw leg. Anything that is not `{ lineString: string }`
 * gives an empty path.
 */
export function decodeLegPath(path: unknown): PathPoint[] {
  if (path === undefined || path === null) return [];

  const container = legPathSchema.safeParse(path);
  if (!container.success) {
    console.warn(`[Journeys] Unexpected leg path shape, leaving it empty: ${getErrorMessage(container.error)}`);
    return [];
  }

  const { lineString } = container.data;
  return lineString ? parseLinePath(lineString) : [];
}

/**
 * Throws when a required field is missing; the caller decides what that
 * means for the destination.
 */
export function normalizeLeg(raw: unknown): Leg {
  const leg = rawLegSchema.parse(raw);
  const normalized: Leg = {
    mode: formatModeName(leg.mode.name),
    durationMinutes: leg.duration,
    from: leg.departurePoint.commonName,
    to: leg.arrivalPoint.commonName,
    path: decodeLegPath(leg.path),
  };

  const instruction = leg.instruction?.summary;
  if (instruction) {
    normalized.instruction = instruction;
  }

  return normalized;
}

/**
 * Distinct modes in first-seen order, e.g. "Walk → Tube → National rail"
 */
export function buildSummary(legs: readonly Leg[]): string {
  return [...new Set(legs.map((leg) => leg.mode))].join(" → ");
}

// ============================================================================
// REDUCTION & ORDERING
// ============================================================================

/**
 * Shortest journey; on equal durations the earlier candidate is kept.
 */
export function selectFastestJourney<T extends { duration: number }>(journeys: readonly T[]): T | undefined {
  let fastest: T | undefined;
  for (const journey of journeys) {
    if (fastest === undefined || journey.duration < fastest.duration) {
      fastest = journey;
    }
  }
  return fastest;
}

function compareJourneyResults(a: JourneyResult, b: JourneyResult): number {
  if (a.durationMinutes === undefined) {
    return b.durationMinutes === undefined ? 0 : 1;
  }
  if (b.durationMinutes === undefined) return -1;
  return a.durationMinutes - b.durationMinutes;
}

/**
 * Quickest first; results without a duration (failed or no journey) last.
 */
export function sortJourneyResults(results: readonly JourneyResult[]): JourneyResult[] {
  return [...results].sort(compareJourneyResults);
}

// ============================================================================
// JOURNEY PLANNER API
// ============================================================================

export function buildJourneyPlannerUrl(
  origin: Coordinates,
  destination: Destination,
  options: Pick<JourneySearchOptions, "date" | "time"> = {}
): string {
  const baseUrl = config.TFL_API_BASE_URL.replace(/\/+$/, "");
  const url = `${baseUrl}/Journey/JourneyResults/${origin.lat},${origin.lon}/to/${destination.locationToken}`;

  const params = new URLSearchParams();
  if (options.date !== undefined) {
    params.set("date", options.date);
  }
  if (options.time !== undefined) {
    params.set("time", options.time);
    params.set("timeIs", "Departing");
  }
  if (config.TFL_APP_KEY) {
    params.set("app_key", config.TFL_APP_KEY);
  }

  const query = params.toString();
  return query ? `${url}?${query}` : url;
}

/**
 * Plan one destination. Resolves with a result for every failure except
 * cancellation of `options.signal`, which rejects with the abort reason.
 */
export async function queryDestination(
  origin: Coordinates,
  destination: Destination,
  options: JourneySearchOptions = {}
): Promise<JourneyResult> {
  const { signal } = options;
  signal?.throwIfAborted();

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(new Error(`provider did not respond within ${config.PROVIDER_TIMEOUT_MS}ms`)),
    config.PROVIDER_TIMEOUT_MS
  );
  const forwardAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener("abort", forwardAbort, { once: true });

  try {
    const response = await fetch(buildJourneyPlannerUrl(origin, destination, options), {
      headers: { Accept: "application/json" },
      signal: controller.signal,
    });

    if (!response.ok) {
      console.warn(`[Journeys] ${destination.name}: provider returned ${response.status}`);
      return journeyFailed(destination.name, `provider returned status ${response.status}`);
    }

    const { journeys } = journeyPlannerResponseSchema.parse(await response.json());
    const fastest = selectFastestJourney(journeys);

    if (!fastest) {
      console.log(`[Journeys] ${destination.name}: no journeys found`);
      return noJourneyFound(destination.name);
    }

    const legs = fastest.legs.map(normalizeLeg);
    return journeyFound(destination.name, fastest.duration, legs, buildSummary(legs));
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    console.error(`[Journeys] ${destination.name} failed:`, getErrorMessage(error));
    return journeyFailed(destination.name, `error: ${getErrorMessage(error)}`);
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener("abort", forwardAbort);
  }
}

/**
 * Fastest journey from `origin` to every destination, quickest first.
 * Always one result per destination unless the search is cancelled.
 */
export async function computeJourneys(
  origin: Coordinates,
  options: JourneySearchOptions = {}
): Promise<JourneyResult[]> {
  const { destinations = AIRPORTS, signal } = options;
  signal?.throwIfAborted();

  const startedAt = Date.now();
  const results = await Promise.all(
    destinations.map((destination) => queryDestination(origin, destination, options))
  );
  signal?.throwIfAborted();

  const reachable = results.filter((result) => result.durationMinutes !== undefined).length;
  console.log(
    `[Journeys] ${reachable}/${results.length} destinations planned from ${origin.lat},${origin.lon} in ${Date.now() - startedAt}ms`
  );

  return sortJourneyResults(results);
}
