/**
 * Formatters module exports
 */
import type { InspectResult, RegisterResult } from '../types/index.js';
import { OutputFormat } from '../types/index.js';
import { formatInspectionText, formatText } from './text.js';
import { formatJSON } from './json.js';

export { formatText, formatInspectionText } from './text.js';
export { formatJSON } from './json.js';

/**
 * Format a registration result based on output format
 */
export function format(result: RegisterResult, outputFormat: OutputFormat): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatText(result);
    case OutputFormat.JSON:
      return formatJSON(result);
  }
}

/**
 * Format an inspection result based on output format
 */
export function formatInspection(result: InspectResult, outputFormat: OutputFormat): string {
  switch (outputFormat) {
    case OutputFormat.Text:
      return formatInspectionText(result);
    case OutputFormat.JSON:
      return formatJSON(result);
  }
}
