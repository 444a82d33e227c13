import mongoose, { Schema } from "mongoose";
import { randomUUID } from "crypto";

export interface ITemplate {
  _id: string;
  userId: string;
  name: string;
  description: string | null;
  storageKey: string;
  variables: Record<string, string>;
  metadata: Record<string, unknown>;
  version: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const templateSchema = new Schema<ITemplate>(
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
    name: {
      type: String,
      required: true,
      index: true,
    },
    description: {
      type: String,
      default: null,
    },
    storageKey: {
      type: String,
      required: true,
    },
    // variable name -> description
    variables: {
      type: Schema.Types.Mixed,
      default: () => ({}),
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: () => ({}),
    },
    version: {
      type: Number,
      default: 1,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

export default mongoose.model<ITemplate>("Template", templateSchema);
