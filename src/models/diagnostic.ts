/**
 * diagnostic.ts
 * Findings produced by the verifier and the sink that receives them.
 */

export const INDENTATION_MESSAGE_KEY = 'indentation.error';

/**
 * One misindented line. Positions are 0-based, as on the syntax nodes.
 * Rendering the message for `messageKey` is up to the consumer.
 */
export interface IndentationDiagnostic {
  line: number;
  actualColumn: number;
  requiredColumn: number;
  tokenText: string;
  messageKey: typeof INDENTATION_MESSAGE_KEY;
}

export interface DiagnosticSink {
  report(diagnostic: IndentationDiagnostic): void;
}

/** Sink that keeps every diagnostic it receives, in arrival order. */
export class CollectingSink implements DiagnosticSink {
  private readonly _diagnostics: IndentationDiagnostic[] = [];

  report(diagnostic: IndentationDiagnostic): void {
    this._diagnostics.push(diagnostic);
  }

  get diagnostics(): readonly IndentationDiagnostic[] {
    return this._diagnostics;
  }
}
