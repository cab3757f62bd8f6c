/**
 * Generate unique request IDs for tracing
 */

export function generateRequestId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Reuse a caller-supplied id when it looks sane, otherwise mint one
 */
export function resolveRequestId(incoming: string | undefined): string {
  if (incoming && /^[\w.-]{1,64}$/.test(incoming)) {
    return incoming;
  }
  return generateRequestId();
}
