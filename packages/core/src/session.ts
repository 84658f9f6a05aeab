/**
 * Parse session: the state shared by every pass over one compilation unit.
 */

import { Handler, type Diagnostic } from "./diagnostics.js";
import { HygieneData } from "./hygiene.js";
import { Lock } from "./lock.js";
import { SourceMap } from "./source-map.js";
import { DEFAULT_EDITION, type Edition, type Span } from "./span.js";

/** Metadata recorded for a registered diagnostic code. */
export interface ErrorInfo {
  description?: string;
  /** Location of the first `__diagnostic_used!` for the code. */
  useSite?: Span;
}

/** Registered diagnostic codes; ordered by code when rendered. */
export type ErrorMap = Map<string, ErrorInfo>;

export interface ParseSessOptions {
  edition?: Edition;
  verbose?: boolean;
  emitter?: (diagnostic: Diagnostic) => void;
}

export class ParseSess {
  readonly spanDiagnostic: Handler;
  readonly sourceMap = new SourceMap();
  readonly hygiene: HygieneData;
  readonly registeredDiagnostics = new Lock<ErrorMap>(new Map());
  /** Attribute ids consumed by some extension. */
  readonly usedAttrs = new Set<number>();
  /** Attribute ids resolved as inert; the expander skips them. */
  readonly knownAttrs = new Set<number>();
  readonly edition: Edition;
  readonly verbose: boolean;

  constructor(options: ParseSessOptions = {}) {
    this.edition = options.edition ?? DEFAULT_EDITION;
    this.verbose = options.verbose ?? false;
    this.spanDiagnostic = new Handler({ emitter: options.emitter });
    this.hygiene = new HygieneData(this.edition, this.verbose);
  }
}
