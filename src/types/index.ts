// Domain records shared by repositories, services and controllers.

export type DocumentStatus = "pending" | "processing" | "completed" | "error";

export const DOCUMENT_STATUSES: readonly DocumentStatus[] = [
  "pending",
  "processing",
  "completed",
  "error",
];

export interface UserRecord {
  id: string;
  username: string;
  passwordHash: string;
  createdAt: Date;
}

export interface DocumentMetadata {
  chunk_count?: number;
  page_count?: number;
  pdf_version?: string;
  processed_at?: string;
  file_size?: number;
  [key: string]: unknown;
}

export interface DocumentRecord {
  id: string;
  userId: string;
  filename: string;
  mimeType: string;
  size: number;
  storageKey: string;
  status: DocumentStatus;
  errorMessage: string | null;
  metadata: DocumentMetadata;
  createdAt: Date;
  updatedAt: Date;
}

export interface ChunkMetadata {
  chunk_index: number;
  token_count: number;
  start_token: number;
  filename: string;
  source: string;
  [key: string]: unknown;
}

export interface ChunkRecord {
  id: string;
  documentId: string;
  userId: string;
  content: string;
  embedding: number[];
  metadata: ChunkMetadata;
  createdAt: Date;
}

export interface ScoredChunk {
  id: string;
  documentId: string;
  content: string;
  metadata: ChunkMetadata;
  similarity: number;
}

export interface TemplateRecord {
  id: string;
  userId: string;
  name: string;
  description: string | null;
  storageKey: string;
  /** Variable name → description. */
  variables: Record<string, string>;
  metadata: Record<string, unknown>;
  version: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/* ---------- API payloads ---------- */

export interface FileStatus {
  file_id: string;
  filename: string;
  status: DocumentStatus;
  chunks_processed: number;
  total_chunks: number | null;
  error: string | null;
  created_at: string;
}

export interface ChatSource {
  content: string;
  document_id: string;
  similarity: number;
  metadata: ChunkMetadata;
}

export interface ChatResponse {
  answer: string;
  sources: ChatSource[];
  template_used: string | null;
}

export interface TemplateChatResponse extends ChatResponse {
  output_file: string | null;
  download_url: string | null;
  extracted: Record<string, unknown> | null;
}

export interface TemplateView {
  id: string;
  name: string;
  description: string | null;
  variables: Record<string, string>;
  metadata: Record<string, unknown>;
  version: number;
  is_active: boolean;
  created_at: string;
  updated_at: string;
}

export interface JwtData {
  sub: string;
  username: string;
}
