import type { InteractionError } from '../types';

export const createInteractionError = (
  type: InteractionError['type'],
  error: unknown,
  details?: Record<string, unknown>
): InteractionError => {
  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? { stack: error.stack } : undefined;
  return {
    type,
    message,
    timestamp: Date.now(),
    details: stack || details ? { ...details, ...stack } : undefined
  };
};
