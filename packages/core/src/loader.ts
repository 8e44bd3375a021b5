import { readFileSync } from 'fs';
import { EmptyDocumentError, InputFileError } from './errors.js';
import { fioOutputSchema, type FioOutput } from './schema.js';

function isEmptyDocument(value: unknown): boolean {
  if (value === null || value === undefined || value === false || value === 0 || value === '') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.length === 0;
  }
  return typeof value === 'object' && value !== null && Object.keys(value).length === 0;
}

/**
 * Reads and validates a fio JSON output file.
 *
 * @throws InputFileError if the file can't be read, isn't JSON or isn't fio output
 * @throws EmptyDocumentError if the file holds an empty JSON value
 */
export function loadFioOutput(filePath: string): FioOutput {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new InputFileError(`Cannot read file ${filePath}`, filePath, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InputFileError(`File ${filePath} is not valid JSON`, filePath, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  if (isEmptyDocument(parsed)) {
    throw new EmptyDocumentError(`JSON file ${filePath} returned empty object`, { filePath });
  }

  const result = fioOutputSchema.safeParse(parsed);
  if (!result.success) {
    throw new InputFileError(`File ${filePath} is not fio JSON output`, filePath, {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
