/** The device bridge lost the device: connect, tap or capture failed. */
export class DeviceUnreachableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeviceUnreachableError";
  }
}

/** The camera app could not be brought to the foreground. */
export class CameraAppUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CameraAppUnavailableError";
  }
}

/**
 * A device or OCR call exceeded its timeout. Fails the current attempt only.
 */
export class OperationTimeoutError extends Error {
  constructor(operation: string, options?: { cause?: unknown }) {
    super(`Timed out: ${operation}`, options);
    this.name = "OperationTimeoutError";
  }
}

export class IncompleteSessionError extends Error {
  constructor(readonly missing: readonly string[]) {
    super(`Mapping is incomplete, unsettled controls: ${missing.join(", ")}`);
    this.name = "IncompleteSessionError";
  }
}

export class PlanValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PlanValidationError";
  }
}

export class CalibrationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CalibrationError";
  }
}

/** A control was committed or marked absent after it had settled. */
export class ControlAlreadySettledError extends Error {
  constructor(readonly control: string) {
    super(`Control ${control} is already settled`);
    this.name = "ControlAlreadySettledError";
  }
}

export class InvalidMappingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMappingError";
  }
}

/** The OCR engine ran but failed on the frame. */
export class TextRecognitionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TextRecognitionError";
  }
}

/** The UI hierarchy dump failed or returned no parsable XML. */
export class UiHierarchyUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "UiHierarchyUnavailableError";
  }
}
