/**
 * Build Session Feature Module
 *
 * Public API:
 * - BuildSession: idle/active build mode with start, tick, confirm, cancel
 * - BuildActor: tick system feeding an actor's anchor into its session
 * - Types: BuildSessionState, BuildEndReason, BuildAnchor, BuildPreview
 */

export type { BuildSessionState, BuildEndReason, BuildAnchor, BuildPreview } from './types';
export { BuildSession } from './build-session';
export type { BuildSessionConfig } from './build-session';
export { BuildActor } from './build-actor';
export type { AnchorProvider } from './build-actor';
