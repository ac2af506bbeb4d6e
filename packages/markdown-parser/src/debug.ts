import { logger } from "./logger";

/**
 * Trace of one parse call. Disabled traces drop everything, so callers can
 * log unconditionally.
 */
export interface DebugTrace {
  readonly enabled: boolean;
  log(message: string): void;
  messages(): string[];
}

export function createDebugTrace(enabled: boolean): DebugTrace {
  const logs: string[] = [];
  return {
    enabled,
    log(message: string) {
      if (!enabled) return;
      logs.push(message);
      logger.debug(message);
    },
    messages() {
      return [...logs];
    },
  };
}

export const disabledTrace: DebugTrace = createDebugTrace(false);
