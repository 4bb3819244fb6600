/**
 * Error code prefixes carried at the start of domain error messages
 */
export const ErrorCode = {
    DegenerateGeometry: "ERROR-WW-01",
    SiteLimit: "ERROR-WW-02",
    DegenerateTriangulation: "ERROR-WW-03",
    SceneRecord: "ERROR-WW-04",
    Output: "ERROR-WW-05",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export function codedError(code: ErrorCodeValue, message: string): Error {
    return new Error(`${code}: ${message}`);
}

/**
 * True for errors raised through `codedError`
 */
export function isCodedError(error: unknown): error is Error {
    return error instanceof Error && /^ERROR-WW-\d{2}:/.test(error.message);
}
