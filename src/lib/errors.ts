/**
 * busbench Error Types
 * Structured error handling
 */

export class BusBenchError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'BusBenchError';
    this.code = code;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Startup Errors
// ============================================================================

export class ConfigurationError extends BusBenchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
    this.name = 'ConfigurationError';
  }
}

export class UnsupportedFieldTypeError extends ConfigurationError {
  constructor(topic: string, field: string, type: string) {
    super(`Unsupported type "${type}" for field ${topic}.${field}`, { topic, field, type });
    this.name = 'UnsupportedFieldTypeError';
  }
}

export class NotFoundError extends BusBenchError {
  constructor(resource: string, id: string, details?: Record<string, unknown>) {
    super('NOT_FOUND', `${resource} not found: ${id}`, { resource, id, ...details });
    this.name = 'NotFoundError';
  }
}

export class ProvisioningError extends BusBenchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PROVISIONING_ERROR', message, details);
    this.name = 'ProvisioningError';
  }
}

export class RegistryError extends BusBenchError {
  constructor(subject: string, cause: unknown) {
    super('REGISTRY_ERROR', `Schema registration failed for ${subject}: ${describeError(cause)}`, {
      subject,
    });
    this.name = 'RegistryError';
  }
}

// ============================================================================
// Run Errors
// ============================================================================

export class ValidationError extends BusBenchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, details);
    this.name = 'ValidationError';
  }
}

export class InvalidFieldError extends ValidationError {
  constructor(topic: string, field: string, reason: string, details?: Record<string, unknown>) {
    super(`Invalid ${topic}.${field}: ${reason}`, { topic, field, reason, ...details });
    this.name = 'InvalidFieldError';
  }
}

export class DeliveryError extends BusBenchError {
  constructor(topic: string, cause: unknown) {
    super('DELIVERY_ERROR', `Delivery to ${topic} failed: ${describeError(cause)}`, { topic });
    this.name = 'DeliveryError';
  }
}

export class MessageError extends BusBenchError {
  constructor(topic: string, reason: string, details?: Record<string, unknown>) {
    super('MESSAGE_ERROR', `Read from ${topic} failed: ${reason}`, { topic, ...details });
    this.name = 'MessageError';
  }
}

export class BridgeError extends BusBenchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('BRIDGE_ERROR', message, details);
    this.name = 'BridgeError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
