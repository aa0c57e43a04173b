export type Stage = 'original' | 'summarized';
export type EnrichmentMode = 'extract' | 'summarize';

export const OUTPUT_STAGES: readonly Stage[] = ['original', 'summarized'];

export const STAGE_FOR_MODE: Record<EnrichmentMode, Stage> = {
  extract: 'original',
  summarize: 'summarized'
};

export const MODE_FOR_STAGE: Record<Stage, EnrichmentMode> = {
  original: 'extract',
  summarized: 'summarize'
};

export interface ObjectDescriptor {
  key: string;
  size: number;
  lastModified?: string | null;
}

export interface ArticleRecord {
  title?: string | null;
  description?: string | null;
  publishedAt?: string | null;
  topic?: string | null;
  content?: string | null;
}

export interface ArticleMetadata {
  publishedAt: string | null;
  topic: string | null;
}

export interface DerivedKeySet {
  contentKey: string;
  metadataKey: string;
}

export interface ChunkFailure {
  chunkIndex: number;
  message: string;
}

export interface WriteFailure {
  key: string;
  message: string;
}

export type ObjectErrorKind = 'fetch' | 'decode' | 'chunk' | 'malformed_key';

export type ObjectOutcome =
  | {
      key: string;
      status: 'processed';
      chunks: number;
      artifacts: string[];
      chunkFailures: ChunkFailure[];
      writeFailures: WriteFailure[];
    }
  | { key: string; status: 'skipped'; reason: 'empty_content' }
  | { key: string; status: 'error'; kind: ObjectErrorKind; message: string };

export interface RunSummary {
  jobId: number;
  mode: EnrichmentMode;
  stage: Stage;
  prefix: string;
  listed: number;
  ineligible: number;
  processed: number;
  skipped: number;
  errored: number;
  chunksProduced: number;
  artifactsWritten: number;
  chunkFailures: number;
  writeFailures: number;
  outcomes: ObjectOutcome[];
}
