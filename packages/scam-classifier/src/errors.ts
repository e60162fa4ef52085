export class ClassifierConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(message);
    this.name = 'ClassifierConfigError';
  }
}

export class ArtifactPathError extends Error {
  constructor(readonly artifact: string) {
    super(`Artifact path escapes the store root: ${artifact}`);
    this.name = 'ArtifactPathError';
  }
}

export class UnsupportedModelFormatError extends Error {
  constructor(readonly artifact: string, readonly format: string) {
    super(`Unsupported model format "${format}" for ${artifact}`);
    this.name = 'UnsupportedModelFormatError';
  }
}

export class ModelArtifactError extends Error {
  constructor(message: string, readonly artifact: string) {
    super(message);
    this.name = 'ModelArtifactError';
  }
}

export function errorFrom(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === 'string' ? value : JSON.stringify(value));
}
