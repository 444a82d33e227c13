import mongoose, { Schema } from "mongoose";
import { randomUUID } from "crypto";

export interface IUser {
  _id: string;
  username: string;
  passwordHash: string;
  createdAt: Date;
}

const userSchema = new Schema<IUser>({
  _id: {
    type: String,
    default: () => randomUUID(),
  },
  username: {
    type: String,
    required: true,
    unique: true,
    trim: true,
  },
  passwordHash: {
    type: String,
    required: true,
  },
  createdAt: {
    type: Date,
    default: Date.now,
  },
});

export default mongoose.model<IUser>("User", userSchema);
