export type PulseErrorCode = 'UNKNOWN_SECTOR' | 'INVALID_WEIGHT';

export class PulseCalculationError extends Error {
  constructor(
    public code: PulseErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PulseCalculationError';
  }
}

/**
 * Raised when a weight edit names a sector the weight map does not hold.
 * The edit is rejected rather than inserting the sector.
 */
export class UnknownSectorError extends PulseCalculationError {
  constructor(public sector: string) {
    super('UNKNOWN_SECTOR', `Unknown sector: ${sector}`);
    this.name = 'UnknownSectorError';
  }
}

export class InvalidWeightError extends PulseCalculationError {
  constructor(
    public sector: string,
    public value: number
  ) {
    super('INVALID_WEIGHT', `Invalid weight for ${sector}: ${value}`);
    this.name = 'InvalidWeightError';
  }
}
