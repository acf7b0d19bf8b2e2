/**
 * agents/index.ts — Barrel export for the session layer.
 *
 * The `middleware/` directory holds stateless interaction helpers; `agents/`
 * holds the stateful modules that reason about the session as a whole:
 *   • OTP Coordinator  — hands webhook-delivered codes to the login flow
 *   • Login Flow       — the OTP login state machine
 *   • Session Manager  — reuse-or-login, session persistence
 */

export { OtpCoordinator } from './otpCoordinator';
export type { TicketReader } from './otpCoordinator';
export { OtpCache } from './otpCache';
export { SessionStore } from './sessionStore';
export type { SessionState } from './sessionStore';
export { LoginFlow } from './loginFlow';
export type { LoginDriver, LoginOutcome, LoginState } from './loginFlow';
export { SessionManager } from './sessionManager';
export type { SessionDriver, SessionOutcome } from './sessionManager';
