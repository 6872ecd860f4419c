export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Maps `items` in consecutive batches of at most `size` concurrent calls, keeping order. */
export async function mapInBatches<T, R>(items: readonly T[], size: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const step = Math.max(1, Math.floor(size));
  const out: R[] = [];
  for (let i = 0; i < items.length; i += step) {
    out.push(...(await Promise.all(items.slice(i, i + step).map(fn))));
  }
  return out;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Like `isRecord`, but arrays do not count. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return isRecord(value) && !Array.isArray(value);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string';
}

export function getArg(name: string, fallback?: string, argv: string[] = process.argv): string | undefined {
  const p = argv.find((v) => v.startsWith(name + '='));
  return p ? p.slice(name.length + 1) : fallback;
}
