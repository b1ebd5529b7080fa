import { z } from "zod";
import type { User } from "../types";

// Local demo accounts only; this is not a security boundary.
export const USERS_STORAGE_KEY = "dermacare.users";

export const DEMO_USER = { email: "demo@demo.com", password: "demo123", name: "Demo User" } as const;

const DirectorySchema = z.record(z.object({ password: z.string(), name: z.string() }));
type Directory = z.infer<typeof DirectorySchema>;

export function loadUsers(): Directory {
  try {
    const saved = localStorage.getItem(USERS_STORAGE_KEY);
    if (!saved) return {};
    const parsed = DirectorySchema.safeParse(JSON.parse(saved));
    return parsed.success ? parsed.data : {};
  } catch {
    // unreadable directory behaves like an empty one
    return {};
  }
}

function saveUsers(users: Directory) {
  localStorage.setItem(USERS_STORAGE_KEY, JSON.stringify(users, null, 2));
}

export function verifyCredentials(email: string, password: string): User | null {
  const entry = loadUsers()[email];
  if (!entry || entry.password !== password) return null;
  return { email, name: entry.name };
}

export function createDemoUser(): User {
  const users = loadUsers();
  users[DEMO_USER.email] = { password: DEMO_USER.password, name: DEMO_USER.name };
  saveUsers(users);
  return { email: DEMO_USER.email, name: DEMO_USER.name };
}
