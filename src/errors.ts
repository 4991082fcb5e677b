/**
 * Conversion failures.
 *
 * Only failures that leave no usable output are thrown; everything that can be
 * degraded goes to the WarningLog instead.
 */

export type ConversionFailureReason =
  | 'InputUnreadable'
  | 'RelationshipAllocationFailed'
  | 'PackageInvariantViolation'
  | 'DestinationWriteFailed';

export class ConversionError extends Error {
  constructor(
    public readonly reason: ConversionFailureReason,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConversionError';
    Error.captureStackTrace?.(this, ConversionError);
  }
}

/** Run an async operation, wrapping anything that is not already a ConversionError. */
export async function withConversionReason<T>(
  operation: () => Promise<T>,
  reason: ConversionFailureReason,
  context?: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    if (error instanceof ConversionError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ConversionError(reason, message, { ...context, cause: message });
  }
}
