/**
 * Shared helpers for replacing the global fetch in unit tests.
 */
import { vi } from 'vitest';

// ============================================================================
// Fetch Mocking
// ============================================================================

export function createMockFetch() {
  return vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();
}

/** Stubs globalThis.fetch; undo with vi.unstubAllGlobals(). */
export function installMockFetch() {
  const mockFetch = createMockFetch();
  vi.stubGlobal('fetch', mockFetch);
  return mockFetch;
}

// ============================================================================
// Response Builders
// ============================================================================

export function mockJsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function mockErrorResponse(message: string, status: number, code?: string): Response {
  return mockJsonResponse({ error: message, message, code }, status);
}

export const TARGET_URL = 'http://target.test/api/items';
