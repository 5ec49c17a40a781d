import type { FlowState, Session, SessionPayload, SessionState } from "./types.js";

export function emptySession(): Session {
  return { state: "idle", payload: {} };
}

/**
 * `idle` with nothing stored is indistinguishable from no record.
 */
export function isEmptySession(session: Session): boolean {
  return session.state === "idle" && Object.keys(session.payload).length === 0;
}

/** States in which plain input belongs to an ongoing flow */
export function isFlowState(state: SessionState): state is FlowState {
  return state === "awaiting_city" || state === "awaiting_broadcast_body";
}

export function mergePayload(
  payload: SessionPayload,
  patch: SessionPayload
): SessionPayload {
  return { ...payload, ...patch };
}
