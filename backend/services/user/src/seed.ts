// backend/services/user/src/seed.ts
import type { User } from "./contracts/user.contract";

/** Directory contents at process start. */
export const SEED_USERS: readonly User[] = [
  { UserName: "Alice", UserAge: 25 },
  { UserName: "Bob", UserAge: 30 },
  { UserName: "Charlie", UserAge: 35 },
];
