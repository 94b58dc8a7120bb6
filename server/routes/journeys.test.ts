import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { createServer, type Server } from 'http';
import { journeyFailed, journeyFound, type JourneyResult } from '@shared/schema';

vi.mock('../services/postcodeService', () => ({ geocodePostcode: vi.fn() }));
vi.mock('../services/journeyService', () => ({ computeJourneys: vi.fn() }));

import { createApp } from '../app';
import { geocodePostcode } from '../services/postcodeService';
import { computeJourneys } from '../services/journeyService';
import { AIRPORTS } from '../services/destinationRegistry';

const origin = { lat: 51.501009, lon: -0.141588 };

const results: JourneyResult[] = [
  journeyFound(
    'Heathrow',
    48,
    [{ mode: 'Tube', durationMinutes: 48, from: 'Green Park', to: 'Heathrow Terminal 5', path: [[51.5067, -0.1428]] }],
    'Tube'
  ),
  journeyFailed('Luton', 'provider returned status 503'),
];

let server: Server;
let baseUrl: string;

beforeAll(async () => {
  server = createServer(createApp());
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('Test server has no port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

beforeEach(() => {
  vi.mocked(geocodePostcode).mockReset();
  vi.mocked(computeJourneys).mockReset();
});

describe('GET /api/search', () => {
  it('plans journeys from the resolved postcode', async () => {
    vi.mocked(geocodePostcode).mockResolvedValue(origin);
    vi.mocked(computeJourneys).mockResolvedValue(results);

    const response = await fetch(`${baseUrl}/api/search?postcode=SW1A%201AA&date=2026-10-20&time=08:30`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ postcode: 'SW1A 1AA', origin, results });
    expect(computeJourneys).toHaveBeenCalledWith(origin, {
      date: '20261020',
      time: '0830',
      signal: expect.any(AbortSignal),
    });
  });

  it('leaves date and time out when the form fields are blank', async () => {
    vi.mocked(geocodePostcode).mockResolvedValue(origin);
    vi.mocked(computeJourneys).mockResolvedValue([]);

    const response = await fetch(`${baseUrl}/api/search?postcode=E1%206AN&date=&time=`);

    expect(response.status).toBe(200);
    expect(computeJourneys).toHaveBeenCalledWith(origin, {
      date: undefined,
      time: undefined,
      signal: expect.any(AbortSignal),
    });
  });

  it('asks for a postcode when none is given', async () => {
    const response = await fetch(`${baseUrl}/api/search?postcode=%20%20`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Please enter a postcode.' });
    expect(geocodePostcode).not.toHaveBeenCalled();
  });

  it('rejects a malformed time', async () => {
    const response = await fetch(`${baseUrl}/api/search?postcode=SW1A%201AA&time=8.30`);
    expect(response.status).toBe(400);
    expect(await response.json()).toMatchObject({
      error: 'validation_error',
      details: [expect.objectContaining({ message: 'Time must be HHmm or HH:mm', path: ['time'] })],
    });
  });

  it('reports an unknown postcode', async () => {
    vi.mocked(geocodePostcode).mockResolvedValue(null);

    const response = await fetch(`${baseUrl}/api/search?postcode=ZZ1%201ZZ`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: "Could not find postcode 'ZZ1 1ZZ'. Please check and try again.",
    });
    expect(computeJourneys).not.toHaveBeenCalled();
  });

  it('answers 500 when the postcode lookup breaks', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.mocked(geocodePostcode).mockRejectedValue(new Error('socket hang up'));

    const response = await fetch(`${baseUrl}/api/search?postcode=SW1A%201AA`);

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'internal_error', message: 'Failed to plan journeys' });
  });
});

describe('GET /api/destinations', () => {
  it('lists the airports in registry order', async () => {
    const response = await fetch(`${baseUrl}/api/destinations`);

    expect(await response.json()).toEqual({ destinations: AIRPORTS });
  });
});

describe('other routes', () => {
  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/api/health`);

    expect(await response.json()).toEqual({ status: 'ok' });
  });

  it('answers 404 JSON for unknown API paths', async () => {
    const response = await fetch(`${baseUrl}/api/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'not_found', message: 'Unknown API endpoint' });
  });

  it('serves the search page for other paths', async () => {
    const response = await fetch(`${baseUrl}/anything`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('text/html');
  });
});
