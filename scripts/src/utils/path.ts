export function dedupe<T>(items: T[]): T[] {
  return Array.from(new Set(items));
}

export function hasExtension(path: string, extensions: string[]): boolean {
  const lower = path.toLowerCase();
  return extensions.some((extension) => lower.endsWith(extension));
}
