/**
 * Single Source of Truth for API Routes and Response Envelopes
 *
 * Route handlers and API clients both import from this file so paths and
 * envelopes cannot drift apart.
 */

// API Response wrapper types
export interface ApiResponse<T = unknown> {
  data: T;
  success: true;
  timestamp: string;
}

export interface ApiError {
  error: string;
  message: string;
  success: false;
  timestamp: string;
  details?: Record<string, unknown>;
}

export function apiSuccess<T>(data: T): ApiResponse<T> {
  return { success: true, data, timestamp: new Date().toISOString() };
}

export const API_BASE = '/api';

export const API_ROUTES = {
  HEALTH: `${API_BASE}/health`,

  SCORING: {
    CONFIG: `${API_BASE}/scoring/config`,
    SCORE: `${API_BASE}/scoring/score`,
    FACTOR: `${API_BASE}/scoring/factor`,
    WHAT_IF: `${API_BASE}/scoring/what-if`,
  },

  CANDIDATES: {
    LIST: `${API_BASE}/candidates`,
    COMPARE: `${API_BASE}/candidates/compare`,
    TRAJECTORIES: `${API_BASE}/candidates/trajectories`,
    GET_BY_ID: `${API_BASE}/candidates/:id`,
  },
} as const;

export function buildCandidateRoute(candidateId: string): string {
  return API_ROUTES.CANDIDATES.GET_BY_ID.replace(':id', encodeURIComponent(candidateId));
}

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  uptime: number;
}
