export interface TextChunk {
  index: number;
  text: string;
}

export interface SearchHit {
  id: number;
  score: number;
}

export interface PipelineMetadata {
  total_chunks: number;
  embedding_dimension: number;
}

export interface QuestionResult {
  questions: string[];
  chunks_used: number;
  model: string;
  metadata: PipelineMetadata;
}

export interface SourceCitation {
  source_id: number;
  text: string;
}

export interface AnswerResult {
  answer: string;
  chunks_used: number;
  model: string;
  sources?: SourceCitation[];
  metadata: PipelineMetadata;
}

export interface QuestionAnswer {
  question: string;
  answer: string;
}

export interface MultiAnswerResult {
  answers: QuestionAnswer[];
  chunks_used: number;
  model: string;
  metadata: PipelineMetadata;
}

export interface ExtractedDocument {
  text: string;
  title: string;
  source: string;
  metadata: Record<string, string>;
}
