/**
 * Raised when record-level orchestration asks for methods a field cannot have
 * Signals a broken caller, so it aborts the run instead of being skipped
 */
export class SynthesisContractError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SynthesisContractError';
  }
}

/**
 * The schema declared no records at all
 */
export class NoRecordsDefinedError extends Error {
  constructor(source: string) {
    super(`No records defined in ${source}`);
    this.name = 'NoRecordsDefinedError';
  }
}

/**
 * Records exist but none carries a query builder annotation
 */
export class NoEligibleRecordsError extends Error {
  constructor(source: string) {
    super(`No eligible records found in ${source}: annotate a record with @querybuilder`);
    this.name = 'NoEligibleRecordsError';
  }
}
