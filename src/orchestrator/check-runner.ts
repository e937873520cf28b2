/**
 * check-runner.ts
 * Single entry-point for checking every header of one document.
 *
 * Pipeline order:
 *   1. InputValidator.resolveConfig(config)
 *   2. InputValidator.validateDocument(document)
 *   3. SyntaxTreeBuilder.build(root)
 *   4. One LineWrappingVerifier per header label, in `headers` order
 *   5. Assemble CheckReport
 */

import type { CheckReport } from '../models/check-document.js';
import type { LineWrapConfig } from '../models/line-wrap-config.js';
import type { DiagnosticSink, IndentationDiagnostic } from '../models/diagnostic.js';
import { InputValidator, ValidationError } from '../services/input-validator.js';
import { SyntaxTreeBuilder } from '../builders/syntax-tree-builder.js';
import { LineWrappingVerifier } from '../analyzers/line-wrapping/line-wrapping-verifier.js';
import { SilentLogger } from '../services/logger.js';
import type { Logger } from '../services/logger.js';

export interface CheckRunnerOptions {
  config?: Partial<LineWrapConfig>;
  /** Receives every diagnostic as soon as it is found. */
  sink?: DiagnosticSink;
  logger?: Logger;
}

export class LineWrapCheckRunner {
  private readonly _config: LineWrapConfig;
  private readonly _sink: DiagnosticSink | undefined;
  private readonly _log: Logger;

  constructor(options: CheckRunnerOptions = {}) {
    this._config = InputValidator.resolveConfig(options.config);
    this._sink = options.sink;
    this._log = options.logger ?? new SilentLogger();
  }

  get config(): LineWrapConfig {
    return { ...this._config };
  }

  /** `document` is untrusted parsed JSON; it is validated first. */
  run(document: unknown): CheckReport {
    const doc = InputValidator.validateDocument(document);
    this._log.info('Line-wrap check starting', {
      headers: doc.headers.length,
      wrapIndentWidth: this._config.wrapIndentWidth,
      strictMode: this._config.strictMode,
    });

    const tree = new SyntaxTreeBuilder(this._log).build(doc.root);
    const diagnostics: IndentationDiagnostic[] = [];

    for (const label of doc.headers) {
      const headerId = tree.findByLabel(label);
      if (headerId === undefined) {
        throw new ValidationError(`Header "${label}" is not present in the built tree.`);
      }
      const verifier = new LineWrappingVerifier(tree, headerId, {
        config: this._config,
        logger: this._log,
        ...(this._sink !== undefined && { sink: this._sink }),
      });
      const found = verifier.checkIndentation();
      this._log.debug('Header checked', { label, diagnostics: found.length });
      diagnostics.push(...found);
    }

    this._log.info('Line-wrap check done', { diagnostics: diagnostics.length });
    return {
      config: this.config,
      headersChecked: doc.headers.length,
      diagnostics,
    };
  }
}
