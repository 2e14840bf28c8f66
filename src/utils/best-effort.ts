import { logger, errorMessage } from './logging';

type RunBestEffortInput = Readonly<{
  operation: string;
  run: () => Promise<unknown>;
  context?: Readonly<Record<string, unknown>>;
}>;

/**
 * Run a side effect whose failure must not fail the caller (outbound email).
 * Never rejects; failures are logged as warnings.
 */
export async function runBestEffort(input: RunBestEffortInput): Promise<void> {
  try {
    await input.run();
  } catch (error: unknown) {
    logger.warn('Best-effort side effect failed', {
      operation: input.operation,
      error: errorMessage(error),
      ...input.context,
    });
  }
}
