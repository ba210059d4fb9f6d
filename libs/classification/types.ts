import type { ErrorIdentity } from '../errors/identities.js';

/**
 * Which rule tier produced a classification, in precedence order.
 */
export type MatchTier =
    | 'misuse'       // IMPROPER_USE_ERROR, never reclassified
    | 'exact'
    | 'mapping'
    | 'pattern'
    | 'fallback'
    | 'passthrough'  // Unmatched, returned as-is
    | 'unexpected';  // Unmatched, replaced by UNEXPECTED_ERROR

export interface Classification {
    /** The final error to report */
    readonly error: ErrorIdentity;
    readonly tier: MatchTier;
}

/**
 * Where the one-line notice for unclassified errors goes.
 * process.stderr satisfies this.
 */
export interface DiagnosticStream {
    write(line: string): unknown;
}

export interface ClassifyOptions {
    /** Trace captured at the failure site, logged with unclassified errors */
    readonly trace?: string;
    /** Defaults to process.stderr */
    readonly diagnostics?: DiagnosticStream;
}
