import { AppError } from "../utils/AppError";

export class MissingDurationError extends AppError {
    constructor(
        message: string = "Please include duration like '30 minutes' in your input.",
    ) {
        super(message, 422, "MISSING_DURATION");
    }
}

export class DurationOutOfRangeError extends AppError {
    constructor(min: number, max: number) {
        super(
            `Duration must be between ${min} and ${max} minutes.`,
            422,
            "DURATION_OUT_OF_RANGE",
        );
    }
}

export class UnknownActivityError extends AppError {
    constructor(
        message: string =
            "Couldn't detect a known activity. Try including words like running, cycling, dancing, etc.",
    ) {
        super(message, 422, "UNKNOWN_ACTIVITY");
    }
}

export class InvalidHeightError extends AppError {
    constructor(heightCm: number) {
        super(
            `Height must be a positive number of centimetres, got ${heightCm}.`,
            422,
            "INVALID_HEIGHT",
        );
    }
}
