// Indicator Error Utilities
// Contract violations raised by the computation core

export type ContractErrorCode =
    | 'UNSORTED_RECORDS'
    | 'UNKNOWN_INTERACTION'
    | 'MISSING_FIELD'
    | 'UNSUPPORTED_INTERACTION'
    | 'MISSING_PERSON_CONTEXT'
    | 'INVALID_CONFIG';

/**
 * Raised when the caller hands the core input that breaks its contract.
 * Empty or degenerate partitions are never errors.
 */
export class IndicatorContractError extends Error {
    readonly code: ContractErrorCode;

    constructor(code: ContractErrorCode, message: string) {
        super(message);
        this.name = 'IndicatorContractError';
        this.code = code;
    }
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
