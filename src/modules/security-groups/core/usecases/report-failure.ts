import type { EntryError } from '../errors.js';
import type { ReconstructionFailureReporter } from '../ports.js';
import type { Logger } from 'pino';

export interface ReportFailureDeps {
  logger: Logger;
  onReconstructionFailure?: ReconstructionFailureReporter | undefined;
}

/**
 * Record an entry that is left out of a result.
 */
export const reportEntryFailure = (deps: ReportFailureDeps, error: EntryError): void => {
  deps.logger.warn(
    { key: error.key, errorType: error.type, ...('details' in error && { details: error.details }) },
    `[SecurityGroups] Skipping cached entry: ${error.message}`
  );
  deps.onReconstructionFailure?.({ key: error.key, error });
};
