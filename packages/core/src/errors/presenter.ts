/**
 * ErrorPresenter - pure presentation layer for PipelineError instances
 */

import type { ErrorCode } from './codes.js';
import type { ErrorContext, PipelineError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  cause?: string;
  colors: boolean;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: PipelineError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: this.#formatExcerpt(error.context),
      cause:
        this._env === 'dev' && error.cause ? error.cause.message : undefined,
      colors: this.#shouldUseColors(this.options.colors),
    };
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const parts: string[] = [];
    if (ctx.path) parts.push(ctx.path);
    if (ctx.position !== undefined) parts.push(`record ${ctx.position}`);
    if (ctx.field) parts.push(`field '${ctx.field}'`);
    return parts.length > 0 ? `Location: ${parts.join(', ')}` : undefined;
  }

  #formatExcerpt(ctx?: ErrorContext): string | undefined {
    if (!ctx || !('value' in ctx)) return undefined;
    const text = JSON.stringify(ctx.value);
    if (text === undefined) return undefined;
    return text.length > 60 ? `${text.slice(0, 57)}...` : text;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
