export type PipelineStage = 'preflight' | 'range' | 'extract' | 'transform' | 'load';

export class PipelineError extends Error {
  readonly stage: PipelineStage;

  constructor(stage: PipelineStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipelineError';
    this.stage = stage;
  }
}
