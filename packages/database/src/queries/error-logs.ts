import { query } from '../client.js';

/**
 * Insert an error log entry.
 * Callers treat this as fire-and-forget and must not let a failure here
 * replace the error being logged.
 */
export async function insertErrorLog(
  service: string,
  errorMessage: string,
  stackTrace?: string,
  context?: Record<string, unknown>,
): Promise<void> {
  await query(
    `INSERT INTO error_logs (service, error_message, stack_trace, context)
     VALUES ($1, $2, $3, $4)
     ON CONFLICT (error_message) DO NOTHING`,
    [service, errorMessage, stackTrace ?? null, context ? JSON.stringify(context) : null],
  );
}
