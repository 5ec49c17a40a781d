/**
 * Per-user conversation state.
 */

export const SESSION_STATES = [
  "idle",
  "awaiting_city",
  "awaiting_broadcast_body",
  "admin_menu",
] as const;

export type SessionState = (typeof SESSION_STATES)[number];

export type FlowState = Extract<SessionState, "awaiting_city" | "awaiting_broadcast_body">;

export interface SessionPayload {
  selectedCityCode?: string;
  selectedCityName?: string;
}

export interface Session {
  state: SessionState;
  payload: SessionPayload;
}
