export class GlanceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Bad flag values or a skip past the end of the text
export class ConfigError extends GlanceError {}

// The text could not be read, or no terminal is available for keys
export class InputSourceError extends GlanceError {}

export class EmptyDocumentError extends GlanceError {
  constructor() {
    super('No words to read: the input is empty');
  }
}
