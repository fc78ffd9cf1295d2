// src/models/user.types.ts
export interface User {
  id: string;
  email: string;
  passwordHash: string;
  fullName: string | null;
  isActive: boolean;
  preferredCurrency: string;
  preferredLanguage: string;
  createdAt: number;
  updatedAt: number;
}

// Row shape in the users table
export interface UserStored {
  id: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  is_active: number;
  preferred_currency: string;
  preferred_language: string;
  created_at: number;
  updated_at: number;
}

// What the API returns for a user: never the hash
export type UserProfile = Omit<User, 'passwordHash'>;

export type CreateUserInput = Pick<User, 'email' | 'passwordHash'> & { fullName?: string | null };

export type UpdateProfileInput = Partial<Pick<User, 'fullName' | 'preferredCurrency' | 'preferredLanguage'>>;

export interface RegisterInput {
  email: string;
  password: string;
  fullName?: string | null;
}

export interface LoginResult {
  token: string;
  tokenType: 'bearer';
  expiresIn: number; // seconds
}
