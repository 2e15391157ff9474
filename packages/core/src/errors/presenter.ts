/**
 * ErrorPresenter - pure presentation layer for SchemasmithError instances
 * - No business logic; formats into view objects the CLI renders
 */

import type { ErrorCode } from './codes.js';
import {
  SchemaValidationError,
  type ErrorContext,
  type SchemasmithError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  file?: string;
  path?: string;
  excerpt?: string;
  workaround?: string;
  details?: string[];
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: SchemasmithError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      file: error.context?.file,
      path: error.context?.path,
      excerpt: error.context?.valueExcerpt,
      workaround: this.#formatWorkaround(error),
      details: this.#formatDetails(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  // Helpers
  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    const loc = ctx.file ?? (ctx.path ? ctx.path : undefined);
    return loc ? `Location: ${loc}` : undefined;
  }

  #formatWorkaround(error: SchemasmithError): string | undefined {
    if (error.suggestions && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  #formatDetails(error: SchemasmithError): string[] | undefined {
    if (!(error instanceof SchemaValidationError)) return undefined;
    return error.failures.map(
      (failure) => `${failure.path || '/'}: ${failure.message}`
    );
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
