/**
 * Raised when a caller hands the planner a value it cannot work with.
 * `field` names the offending input so the form can point the user at it.
 */
export class InvalidInputError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'InvalidInputError';
        this.field = field;
    }
}

export const isInvalidInputError = (error: unknown): error is InvalidInputError =>
    error instanceof InvalidInputError;
