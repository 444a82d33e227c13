import User, { type IUser } from "../models/user.js";
import { ConflictError } from "../utils/errors.js";
import type { UserRecord } from "../types/index.js";

export interface NewUser {
  username: string;
  passwordHash: string;
}

export interface UserRepository {
  findById(id: string): Promise<UserRecord | null>;
  findByUsername(username: string): Promise<UserRecord | null>;
  /** @throws ConflictError when the username is taken */
  create(input: NewUser): Promise<UserRecord>;
}

const toRecord = (doc: IUser): UserRecord => ({
  id: doc._id,
  username: doc.username,
  passwordHash: doc.passwordHash,
  createdAt: doc.createdAt,
});

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === "object" && error !== null && "code" in error && error.code === 11000;

export class MongoUserRepository implements UserRepository {
  async findById(id: string): Promise<UserRecord | null> {
    const doc = await User.findById(id).lean<IUser>();
    return doc ? toRecord(doc) : null;
  }

  async findByUsername(username: string): Promise<UserRecord | null> {
    const doc = await User.findOne({ username }).lean<IUser>();
    return doc ? toRecord(doc) : null;
  }

  async create(input: NewUser): Promise<UserRecord> {
    try {
      const doc = await User.create(input);
      return toRecord(doc.toObject());
    } catch (error) {
      if (isDuplicateKeyError(error)) throw new ConflictError("User already registered");
      throw error;
    }
  }
}
