import { HydratedDocument } from "mongoose";
import { Models } from "../../models";
import { IUser } from "../../models/User";
import { NewUser, PageQuery, UserRecord, UserRepository } from "../types";
import { SessionRef, isObjectId, rethrowDuplicateKey } from "./session";

const toUserRecord = (doc: HydratedDocument<IUser>): UserRecord => ({
  id: doc._id.toString(),
  email: doc.email,
  passwordHash: doc.password,
  name: doc.name,
  phone: doc.phone ?? null,
  role: doc.role,
  createdAt: doc.createdAt,
});

export const createUserRepository = (
  { User }: Models,
  session: SessionRef
): UserRepository => ({
  async findById(id) {
    if (!isObjectId(id)) {
      return null;
    }
    const doc = await User.findById(id).session(session);
    return doc ? toUserRecord(doc) : null;
  },

  async findByEmail(email) {
    const doc = await User.findOne({ email: email.trim().toLowerCase() }).session(session);
    return doc ? toUserRecord(doc) : null;
  },

  async create(user: NewUser) {
    const doc = await new User({
      email: user.email,
      password: user.passwordHash,
      name: user.name,
      phone: user.phone ?? undefined,
      role: user.role,
    })
      .save({ session })
      .catch(rethrowDuplicateKey("email"));
    return toUserRecord(doc);
  },

  async listCustomers({ skip, limit }: PageQuery) {
    const docs = await User.find({ role: "customer" })
      .sort({ createdAt: -1 })
      .skip(skip)
      .limit(limit)
      .session(session);
    return docs.map(toUserRecord);
  },

  async countCustomers() {
    return User.countDocuments({ role: "customer" }).session(session).exec();
  },
});
