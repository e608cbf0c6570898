// ============================================================================
// RESOURCES - Scarce quantities every agent and region pool holds
// ============================================================================

export type ResourceKind = 'energy' | 'bandwidth' | 'memory' | 'compute';

/** Fixed iteration order. Serialization and physics depend on it. */
export const RESOURCE_KINDS: readonly ResourceKind[] = ['energy', 'bandwidth', 'memory', 'compute'];

export interface Resources {
  readonly energy: number;
  readonly bandwidth: number;
  readonly memory: number;
  readonly compute: number;
}

/** Partial amounts, used for costs and transfers */
export type ResourceBundle = Partial<Record<ResourceKind, number>>;

export const EMPTY_RESOURCES: Resources = { energy: 0, bandwidth: 0, memory: 0, compute: 0 };

export function createResources(values: ResourceBundle = {}): Resources {
  return {
    energy: values.energy ?? 0,
    bandwidth: values.bandwidth ?? 0,
    memory: values.memory ?? 0,
    compute: values.compute ?? 0,
  };
}

function build(fn: (kind: ResourceKind) => number): Resources {
  return {
    energy: fn('energy'),
    bandwidth: fn('bandwidth'),
    memory: fn('memory'),
    compute: fn('compute'),
  };
}

export function canAfford(pool: Resources, bundle: ResourceBundle): boolean {
  return RESOURCE_KINDS.every((kind) => pool[kind] >= (bundle[kind] ?? 0));
}

/** Returns undefined when any kind would go negative */
export function subtractBundle(pool: Resources, bundle: ResourceBundle): Resources | undefined {
  if (!canAfford(pool, bundle)) {
    return undefined;
  }
  return build((kind) => pool[kind] - (bundle[kind] ?? 0));
}

export function addBundle(pool: Resources, bundle: ResourceBundle): Resources {
  return build((kind) => pool[kind] + (bundle[kind] ?? 0));
}

export function scaleBundle(bundle: ResourceBundle, factor: number): Resources {
  return build((kind) => (bundle[kind] ?? 0) * factor);
}

/** Remainder after taking `part` out of `pool`, without the affordability check */
export function difference(pool: Resources, part: Resources): Resources {
  return build((kind) => pool[kind] - part[kind]);
}

export function isEmptyBundle(bundle: ResourceBundle): boolean {
  return RESOURCE_KINDS.every((kind) => (bundle[kind] ?? 0) === 0);
}

export function isValidBundle(bundle: ResourceBundle): boolean {
  return RESOURCE_KINDS.every((kind) => {
    const amount = bundle[kind];
    return amount === undefined || (Number.isFinite(amount) && amount >= 0);
  });
}

export function sameResources(a: Resources, b: Resources): boolean {
  return RESOURCE_KINDS.every((kind) => a[kind] === b[kind]);
}

export function totalOf(kind: ResourceKind, ...pools: Resources[]): number {
  return pools.reduce((sum, pool) => sum + pool[kind], 0);
}
