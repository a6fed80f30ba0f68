/**
 * Pipeline Error Handling
 *
 * FAIL FAST: All errors throw immediately with descriptive context.
 * Every failure carries a category so tool responses and pipeline results
 * report the same vocabulary.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for pipeline and tool failures
 */
export type ErrorCategory =
  // Input errors
  | 'VALIDATION_ERROR'
  | 'INPUT_VALIDATION_ERROR'
  | 'MISSING_FIELD'

  // Generation errors
  | 'GENERATION_FORMAT_ERROR'
  | 'SEMANTIC_GROUNDING_ERROR'

  // External capability errors
  | 'EXTERNAL_CAPABILITY_ERROR'
  | 'EXTERNAL_TIMEOUT'

  // Orchestration errors
  | 'ORCHESTRATION_ERROR'

  // Registry errors
  | 'HYPOTHESIS_NOT_FOUND'
  | 'INTEGRITY_VERIFICATION_FAILED'

  // Server errors
  | 'SERVICES_NOT_INITIALIZED'
  | 'INTERNAL_ERROR';

// ═══════════════════════════════════════════════════════════════════════════════
// BASE ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * PipelineError - Structured error class for all pipeline and tool failures
 *
 * FAIL FAST: Thrown immediately when any error condition is detected.
 * Provides category, message, and optional details for debugging.
 */
export class PipelineError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create error from unknown caught value
   * FAIL FAST: Always produces a typed error
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: ErrorCategory = 'INTERNAL_ERROR'
  ): PipelineError {
    if (error instanceof PipelineError) {
      return error;
    }

    if (error instanceof Error) {
      // Tool-input ValidationError from utils/validation
      const category: ErrorCategory =
        error.name === 'ValidationError' ? 'VALIDATION_ERROR' : defaultCategory;
      return new PipelineError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new PipelineError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// SPECIALIZED ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Malformed or incomplete input documents, analyses, or records.
 */
export class InputValidationError extends PipelineError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    category: ErrorCategory = 'INPUT_VALIDATION_ERROR'
  ) {
    super(category, message, details);
    this.name = 'InputValidationError';
  }
}

/**
 * One or more required fields are absent. Lists every missing field in one error.
 */
export class MissingFieldError extends InputValidationError {
  public readonly fields: string[];

  constructor(fields: string[], subject = 'input') {
    super(`Missing required fields in ${subject}: ${fields.join(', ')}`, { fields, subject }, 'MISSING_FIELD');
    this.name = 'MissingFieldError';
    this.fields = fields;
  }
}

/**
 * Generation output could not be parsed into a structured object.
 */
export class GenerationFormatError extends PipelineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('GENERATION_FORMAT_ERROR', message, details);
    this.name = 'GenerationFormatError';
  }
}

/**
 * Generated content references ids or variables absent from the graph.
 * Raised only inside the retry loop; never surfaces as a pipeline failure.
 */
export class SemanticGroundingError extends PipelineError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super('SEMANTIC_GROUNDING_ERROR', `Hypothesis failed grounding: ${errors.join('; ')}`, {
      errors,
    });
    this.name = 'SemanticGroundingError';
    this.errors = errors;
  }
}

/**
 * Extraction or generation capability failed or exceeded its time budget.
 */
export class ExternalCapabilityError extends PipelineError {
  public readonly capability: string;

  constructor(
    capability: string,
    message: string,
    options: { timeout?: boolean; cause?: unknown } = {}
  ) {
    const causeMessage =
      options.cause instanceof Error ? options.cause.message : options.cause !== undefined ? String(options.cause) : undefined;
    super(options.timeout ? 'EXTERNAL_TIMEOUT' : 'EXTERNAL_CAPABILITY_ERROR', message, {
      capability,
      cause: causeMessage,
    });
    this.name = 'ExternalCapabilityError';
    this.capability = capability;
  }

  get isTimeout(): boolean {
    return this.category === 'EXTERNAL_TIMEOUT';
  }
}

/**
 * Failure attributed to a named pipeline phase.
 */
export class OrchestrationError extends PipelineError {
  public readonly phase: string;

  constructor(phase: string, message: string, details?: Record<string, unknown>) {
    super('ORCHESTRATION_ERROR', message, { ...details, phase });
    this.name = 'OrchestrationError';
    this.phase = phase;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format PipelineError for tool response
 * ALWAYS includes category, message, and details
 */
export function formatErrorResponse(error: PipelineError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create hypothesis not found error
 */
export function hypothesisNotFoundError(hypothesisId: string): PipelineError {
  return new PipelineError('HYPOTHESIS_NOT_FOUND', `Hypothesis "${hypothesisId}" not found`, {
    hypothesisId,
  });
}

/**
 * Create services not initialized error
 */
export function servicesNotInitializedError(): PipelineError {
  return new PipelineError(
    'SERVICES_NOT_INITIALIZED',
    'Pipeline services are not initialized. Call initializeServices() at startup.'
  );
}
