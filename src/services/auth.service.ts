import type { Db, User } from "../db/stores.js";
import { isUniqueViolation } from "../db/pg_errors.js";
import { hashPassword, verifyPassword } from "../shared/utils/password.js";

type RegisterResult =
  | { ok: true; user: User }
  | { ok: false; error: "PASSWORD_MISMATCH" | "USERNAME_TAKEN"; message: string };

export async function registerUser(
  db: Db,
  input: {
    username: string;
    email: string;
    password: string;
    confirmation: string;
    address?: string;
    phoneNumber?: string;
  }
): Promise<RegisterResult> {
  if (input.password !== input.confirmation) {
    return { ok: false, error: "PASSWORD_MISMATCH", message: "Passwords must match" };
  }

  const passwordHash = await hashPassword(input.password);
  const taken: RegisterResult = { ok: false, error: "USERNAME_TAKEN", message: "Username already taken" };

  try {
    return await db.transaction(async (stores): Promise<RegisterResult> => {
      if (await stores.users.findByUsername(input.username)) return taken;

      const user = await stores.users.insert({
        username: input.username,
        email: input.email,
        passwordHash,
        address: input.address ?? null,
        phoneNumber: input.phoneNumber ?? null,
      });
      return { ok: true, user };
    });
  } catch (err) {
    // lost a race with another registration for the same username
    if (isUniqueViolation(err)) return taken;
    throw err;
  }
}

/** Returns the user only when the password matches. */
export async function authenticate(
  db: Db,
  input: { username: string; password: string }
): Promise<User | null> {
  const user = await db.transaction((stores) => stores.users.findByUsername(input.username));
  if (!user) return null;

  return (await verifyPassword(input.password, user.passwordHash)) ? user : null;
}

export async function getProfile(db: Db, userId: string): Promise<User | null> {
  return db.transaction((stores) => stores.users.findById(userId));
}
