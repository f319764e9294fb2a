export function getErrorInfo(e: unknown): { message: string; stack?: string; name?: string } {
  if (e instanceof Error) return { message: e.message, stack: e.stack, name: e.name };
  if (typeof e === 'string') return { message: e };
  try {
    return { message: JSON.stringify(e) ?? String(e) };
  } catch {
    return { message: String(e) };
  }
}
