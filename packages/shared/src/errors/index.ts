/**
 * Custom error hierarchy for scrapelink
 */

import type { RelationRole } from '../types/relation.js';

export type ErrorCategory =
  | 'RELATION'
  | 'FRAGMENT'
  | 'TOOL'
  | 'TARGET'
  | 'CONFIGURATION'
  | 'UNKNOWN';

export type ErrorSeverity = 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

export interface ErrorContext {
  category: ErrorCategory;
  severity: ErrorSeverity;
  /** Fatal errors halt initialization; everything else is scoped to one peer */
  fatal: boolean;
  relationId?: number;
  relationName?: string;
  [key: string]: unknown;
}

/**
 * Base error class for scrapelink
 */
export class ScrapeLinkError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    context: Partial<ErrorContext> = {}
  ) {
    super(message);
    this.name = 'ScrapeLinkError';
    this.code = code;
    this.context = {
      category: context.category ?? 'UNKNOWN',
      severity: context.severity ?? 'MEDIUM',
      fatal: context.fatal ?? false,
      ...context,
    };
    this.timestamp = new Date();

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

/**
 * A relation is declared with the wrong name, interface or role.
 * Raised at setup, before any data is exchanged.
 */
export class ConfigMismatchError extends ScrapeLinkError {
  constructor(message: string, code: string, context: Partial<ErrorContext> = {}) {
    super(message, code, {
      category: 'RELATION',
      severity: 'CRITICAL',
      fatal: true,
      ...context,
    });
    this.name = 'ConfigMismatchError';
  }
}

export class RelationNotFoundError extends ConfigMismatchError {
  public readonly relationName: string;

  constructor(relationName: string) {
    super(`No relation named '${relationName}' found`, 'E1001', { relationName });
    this.name = 'RelationNotFoundError';
    this.relationName = relationName;
  }
}

export class RelationInterfaceMismatchError extends ConfigMismatchError {
  public readonly relationName: string;
  public readonly expectedInterface: string;
  public readonly actualInterface: string;

  constructor(relationName: string, expectedInterface: string, actualInterface: string) {
    super(
      `The '${relationName}' relation has '${actualInterface}' as interface rather than the expected '${expectedInterface}'`,
      'E1002',
      { relationName, expectedInterface, actualInterface }
    );
    this.name = 'RelationInterfaceMismatchError';
    this.relationName = relationName;
    this.expectedInterface = expectedInterface;
    this.actualInterface = actualInterface;
  }
}

export class RelationRoleMismatchError extends ConfigMismatchError {
  public readonly relationName: string;
  public readonly expectedRole: RelationRole;
  public readonly actualRole: RelationRole;

  constructor(relationName: string, expectedRole: RelationRole, actualRole: RelationRole) {
    super(
      `The '${relationName}' relation has role '${actualRole}' rather than the expected '${expectedRole}'`,
      'E1003',
      { relationName, expectedRole, actualRole }
    );
    this.name = 'RelationRoleMismatchError';
    this.relationName = relationName;
    this.expectedRole = expectedRole;
    this.actualRole = actualRole;
  }
}

/**
 * A job or rule fragment from one peer could not be parsed
 */
export class MalformedFragmentError extends ScrapeLinkError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E2001', {
      category: 'FRAGMENT',
      severity: 'MEDIUM',
      fatal: false,
      ...context,
    });
    this.name = 'MalformedFragmentError';
  }
}

export class InvalidAlertRulePathError extends ScrapeLinkError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid alert rules path ${path}: ${reason}`, 'E2002', {
      category: 'FRAGMENT',
      severity: 'LOW',
      fatal: false,
      path,
      reason,
    });
    this.name = 'InvalidAlertRulePathError';
    this.path = path;
  }
}

/**
 * The label-matcher tool cannot be found for this platform
 */
export class ToolUnavailableError extends ScrapeLinkError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E3001', {
      category: 'TOOL',
      severity: 'LOW',
      fatal: false,
      ...context,
    });
    this.name = 'ToolUnavailableError';
  }
}

/**
 * The label-matcher tool failed or timed out on one expression
 */
export class ToolFailureError extends ScrapeLinkError {
  public readonly timedOut: boolean;

  constructor(message: string, context: Partial<ErrorContext> & { timedOut?: boolean } = {}) {
    super(message, 'E3002', {
      category: 'TOOL',
      severity: 'LOW',
      fatal: false,
      ...context,
    });
    this.name = 'ToolFailureError';
    this.timedOut = context.timedOut ?? false;
  }
}

/**
 * A scrape target is not of the form host:port
 */
export class TargetFormatError extends ScrapeLinkError {
  public readonly target: string;

  constructor(target: string, context: Partial<ErrorContext> = {}) {
    super(`Scrape target '${target}' is not of the form host:port`, 'E4001', {
      category: 'TARGET',
      severity: 'MEDIUM',
      fatal: false,
      target,
      ...context,
    });
    this.name = 'TargetFormatError';
    this.target = target;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends ScrapeLinkError {
  constructor(message: string, context: Partial<ErrorContext> = {}) {
    super(message, 'E9001', {
      category: 'CONFIGURATION',
      severity: 'CRITICAL',
      fatal: true,
      ...context,
    });
    this.name = 'ConfigurationError';
  }
}

/**
 * Helper to check if an error must halt initialization
 */
export function isFatalError(error: unknown): boolean {
  if (error instanceof ScrapeLinkError) {
    return error.context.fatal;
  }
  return false;
}

/**
 * Helper to wrap unknown errors
 */
export function wrapError(error: unknown, context: Partial<ErrorContext> = {}): ScrapeLinkError {
  if (error instanceof ScrapeLinkError) {
    return error;
  }

  if (error instanceof Error) {
    return new ScrapeLinkError(error.message, 'E9999', {
      category: 'UNKNOWN',
      severity: 'MEDIUM',
      fatal: false,
      originalError: error.name,
      ...context,
    });
  }

  return new ScrapeLinkError(String(error), 'E9999', {
    category: 'UNKNOWN',
    severity: 'MEDIUM',
    fatal: false,
    ...context,
  });
}
