export { World, orderActions } from './world';
export type { TickResult } from './world';
export { applyEvent } from './apply';
export { runPhysics, decayAndRegen } from './physics';
export type { PhysicsOutcome } from './physics';
export { replayRecords } from './replay';
export { IntegrityError, ReplayRangeError } from './errors';
