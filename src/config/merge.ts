export function isObject(item: unknown): item is Record<string, unknown> {
  return Boolean(item) && typeof item === 'object' && !Array.isArray(item);
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(cloneValue);
  }
  if (isObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = cloneValue(v);
    }
    return out;
  }
  return value;
}

function mergeInto(target: Record<string, unknown>, source: Record<string, unknown>): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    // undefined never erases a lower layer
    if (sourceValue === undefined) continue;

    const targetValue = target[key];
    if (isObject(sourceValue) && isObject(targetValue)) {
      mergeInto(targetValue, sourceValue);
    } else {
      target[key] = cloneValue(sourceValue);
    }
  }
}

/** Merge plain-object layers left to right into a fresh object; arrays are replaced, not concatenated. */
export function deepMerge(...layers: Array<Record<string, unknown> | null | undefined>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const layer of layers) {
    if (layer) mergeInto(out, layer);
  }
  return out;
}

/** Recursively freeze a configuration tree. */
export function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
