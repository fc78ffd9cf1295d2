// src/services/userService.ts
import { v4 as uuidv4 } from 'uuid';
import { db } from '../database';
import { CreateUserInput, UpdateProfileInput, User, UserProfile, UserStored } from '../models/user.types';

const mapStoredToUser = (stored: UserStored): User => ({
  id: stored.id,
  email: stored.email,
  passwordHash: stored.password_hash,
  fullName: stored.full_name,
  isActive: stored.is_active === 1,
  preferredCurrency: stored.preferred_currency,
  preferredLanguage: stored.preferred_language,
  createdAt: stored.created_at,
  updatedAt: stored.updated_at,
});

export const normalizeEmail = (email: string): string => email.trim().toLowerCase();

export const toProfile = (user: User): UserProfile => {
  const { passwordHash: _passwordHash, ...profile } = user;
  return profile;
};

export const createUser = (userData: CreateUserInput): User => {
  const now = Date.now();
  const newUser: User = {
    id: uuidv4(),
    email: normalizeEmail(userData.email),
    passwordHash: userData.passwordHash,
    fullName: userData.fullName ?? null,
    isActive: true,
    preferredCurrency: 'USD',
    preferredLanguage: 'en',
    createdAt: now,
    updatedAt: now,
  };

  db.prepare<[string, string, string, string | null, number, string, string, number, number]>(
    `INSERT INTO users (id, email, password_hash, full_name, is_active, preferred_currency, preferred_language, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    newUser.id,
    newUser.email,
    newUser.passwordHash,
    newUser.fullName,
    1,
    newUser.preferredCurrency,
    newUser.preferredLanguage,
    newUser.createdAt,
    newUser.updatedAt
  );

  return newUser;
};

// The email column is COLLATE NOCASE, so lookups ignore case.
export const findUserByEmail = (email: string): User | undefined => {
  const stored = db.prepare<[string], UserStored>('SELECT * FROM users WHERE email = ?').get(normalizeEmail(email));
  return stored ? mapStoredToUser(stored) : undefined;
};

export const findUserById = (id: string): User | undefined => {
  const stored = db.prepare<[string], UserStored>('SELECT * FROM users WHERE id = ?').get(id);
  return stored ? mapStoredToUser(stored) : undefined;
};

export const updateUserProfile = (id: string, updateData: UpdateProfileInput): User | undefined => {
  const updates: string[] = [];
  const params: (string | number | null)[] = [];

  if (updateData.fullName !== undefined) {
    updates.push('full_name = ?');
    params.push(updateData.fullName);
  }
  if (updateData.preferredCurrency !== undefined) {
    updates.push('preferred_currency = ?');
    params.push(updateData.preferredCurrency);
  }
  if (updateData.preferredLanguage !== undefined) {
    updates.push('preferred_language = ?');
    params.push(updateData.preferredLanguage);
  }

  updates.push('updated_at = ?');
  params.push(Date.now(), id);

  const result = db.prepare(`UPDATE users SET ${updates.join(', ')} WHERE id = ?`).run(...params);
  if (result.changes === 0) {
    return undefined;
  }
  return findUserById(id);
};
