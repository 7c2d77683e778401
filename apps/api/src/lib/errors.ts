export function errToMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
