/**
 * Store-layer failures. Business-rule violations never surface as these:
 * they travel as `{ success: false, message }` results instead.
 */
export class StoreError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class SchemaMismatchError extends StoreError {
  constructor(
    public readonly table: string,
    public readonly missing: string[],
    public readonly unexpected: string[],
  ) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`missing columns: ${missing.join(", ")}`);
    if (unexpected.length > 0) parts.push(`unexpected columns: ${unexpected.join(", ")}`);
    super(`Table "${table}" does not match the expected schema (${parts.join("; ")})`, "verifySchema");
    this.name = "SchemaMismatchError";
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs a store call and rethrows anything the driver raises as a StoreError
 * tagged with the operation name.
 */
export async function storeCall<T>(operation: string, fn: () => T | Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof StoreError) {
      throw error;
    }
    throw new StoreError(`${operation} failed: ${describe(error)}`, operation, { cause: error });
  }
}
