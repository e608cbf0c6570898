/**
 * The recorded history and the state derived from it disagree. Never
 * corrected automatically; the operator has to look at it.
 */
export class IntegrityError extends Error {
  readonly tick: number | undefined;

  constructor(message: string, tick?: number) {
    super(tick === undefined ? message : `[tick ${tick}] ${message}`);
    this.name = 'IntegrityError';
    this.tick = tick;
  }
}

/** Replay target lies outside the committed range */
export class ReplayRangeError extends RangeError {
  constructor(targetTick: number, headTick: number) {
    super(`Cannot replay tick ${targetTick}; committed ticks are 0..${headTick}`);
    this.name = 'ReplayRangeError';
  }
}
