import mongoose, { Schema } from "mongoose";
import { randomUUID } from "crypto";
import { DOCUMENT_STATUSES, type DocumentMetadata, type DocumentStatus } from "../types/index.js";

export interface IDocument {
  _id: string;
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

const documentSchema = new Schema<IDocument>(
  {
    _id: {
      type: String,
      default: () => randomUUID(),
    },
    userId: {
      type: String,
      ref: "User",
      required: true,
      index: true,
    },
    filename: {
      type: String,
      required: true,
    },
    mimeType: {
      type: String,
      required: true,
    },
    size: {
      type: Number,
      required: true,
    },
    storageKey: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      enum: [...DOCUMENT_STATUSES],
      default: "pending",
    },
    errorMessage: {
      type: String,
      default: null,
    },
    // chunk_count, page_count, processed_at, file_size once processed
    metadata: {
      type: Schema.Types.Mixed,
      default: () => ({}),
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

export default mongoose.model<IDocument>("Document", documentSchema);
