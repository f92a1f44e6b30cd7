// waymark/http/errors.ts

/** A request-time failure that maps onto a specific status code. */
export class HttpError extends Error {
    constructor(
        readonly status: number,
        message: string,
    ) {
        super(message);
        this.name = "HttpError";
    }
}

export const isHttpError = (e: unknown): e is HttpError => e instanceof HttpError;
