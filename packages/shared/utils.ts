export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

/**
 * Mirror URL wins over the provider URL; empty strings count as absent.
 */
export function resolveImageUrl(
  mirrorUrl: string | null | undefined,
  externalImageUrl: string | null | undefined,
): string | null {
  if (mirrorUrl) {
    return mirrorUrl;
  }
  return externalImageUrl || null;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (size <= 0) {
    throw new RangeError(`Chunk size must be positive, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
