/**
 * JSON formatter for machine-readable output
 */
import type { InspectResult, RegisterResult } from '../types/index.js';

/**
 * Format a registration or inspection result as JSON
 */
export function formatJSON(result: RegisterResult | InspectResult): string {
  return JSON.stringify(result, null, 2);
}
