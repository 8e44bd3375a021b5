/**
 * Extraction Error Classes
 *
 * Every failure aborts the run; none of these is caught inside the pipeline.
 */

import { AppError, type ErrorContext } from '@fiometrics/utils';

/**
 * Input file could not be read, parsed or does not have the expected shape
 */
export class InputFileError extends AppError {
  constructor(message: string, filePath: string, context?: ErrorContext) {
    super(message, 'INPUT_ERROR', { filePath, ...context });
  }
}

/**
 * Some data is missing from the JSON output: the document itself is empty,
 * or nothing usable could be extracted from it
 */
export class NoValuesError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'NO_VALUES', context);
  }
}

export class EmptyDocumentError extends NoValuesError {}

export class NoUsableDataError extends NoValuesError {}

/**
 * Data-contract violations: unknown units, unparseable numbers, unsupported modes
 */
export class DomainError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'DOMAIN_ERROR', context, false);
  }
}

export class UnitLookupError extends DomainError {
  constructor(unit: string, value: string) {
    super(`Unit '${unit}' not found in conversion table (value '${value}')`, { unit, value });
  }
}

export class ValueParseError extends DomainError {
  constructor(value: string) {
    super(`Value '${value}' has no numerical part`, { value });
  }
}

export class UnsupportedRwModeError extends DomainError {
  constructor(mode: string) {
    super(`Only read/randread/write/randwrite are supported, got '${mode}'`, { mode });
  }
}

export class MissingParameterError extends DomainError {
  constructor(parameter: string, jobIndex: number) {
    super(`Parameter '${parameter}' was not extracted for job ${jobIndex}`, {
      parameter,
      jobIndex,
    });
  }
}

/**
 * A key on a metric's path is absent from a job's result block
 */
export class MissingMetricError extends AppError {
  constructor(key: string, jobIndex: number, context?: ErrorContext) {
    super(`Required metric ${key} not present in json output`, 'MISSING_METRIC', {
      key,
      jobIndex,
      ...context,
    });
  }
}
