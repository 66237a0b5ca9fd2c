/**
 * Where the FETCH stage gets raw works from (a JSON dump, the live API, a test double).
 * Works are returned untyped; the normalizer reads every field through the lookup helpers.
 */
export interface WorkSource {
    /** Human-readable source name */
    readonly name: string;

    fetchWorks(): Promise<unknown[]>;
}

export interface WorkSourceOptions {
    apiKey?: string;
    email?: string;
}
