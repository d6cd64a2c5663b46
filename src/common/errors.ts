export class NoSourcesConfiguredError extends Error {
  constructor() {
    super('No audio sources are configured');
    this.name = 'NoSourcesConfiguredError';
  }
}

export class SourceNotFoundError extends Error {
  constructor(public readonly sourceName: string) {
    super(`Source not registered: ${sourceName}`);
    this.name = 'SourceNotFoundError';
  }
}
