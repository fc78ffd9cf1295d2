// src/services/authService.ts
import bcryptjs from 'bcryptjs';
import jsonwebtoken, { JwtPayload } from 'jsonwebtoken';
import { getConfig, getJwtSecret } from '../config';
import { LoginResult, RegisterInput, UpdateProfileInput, User, UserProfile } from '../models/user.types';
import { DuplicateEmail, InvalidCredentials, NotFound, Unauthenticated, ValidationError } from '../utils/errors';
import logger from '../utils/logger';
import { createUser, findUserByEmail, findUserById, toProfile, updateUserProfile } from './userService';

const MIN_PASSWORD_LENGTH = 6;

// Compared against when the email is unknown so both failure paths hash once.
let dummyHashPromise: Promise<string> | undefined;
const getDummyHash = (): Promise<string> => {
  if (!dummyHashPromise) {
    dummyHashPromise = bcryptjs.hash('placeholder-password', getConfig().bcryptSaltRounds);
  }
  return dummyHashPromise;
};

export const validateCredentialsShape = (email: string, password: string): void => {
  if (!email || !password) {
    throw new ValidationError('Email and password are required.');
  }
  if (!email.includes('@') || email.trim().length < 5) {
    throw new ValidationError('Invalid email format.');
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`);
  }
};

export const register = async (input: RegisterInput): Promise<UserProfile> => {
  // Input validation
  validateCredentialsShape(input.email, input.password);

  // Check if user already exists
  if (findUserByEmail(input.email)) {
    throw new DuplicateEmail();
  }

  // Hash password
  const passwordHash = await bcryptjs.hash(input.password, getConfig().bcryptSaltRounds);

  // Another registration may have taken the email while hashing.
  if (findUserByEmail(input.email)) {
    throw new DuplicateEmail();
  }

  const newUser = createUser({ email: input.email, passwordHash, fullName: input.fullName });
  logger.info(`User registered: ${newUser.email} (ID: ${newUser.id})`);
  return toProfile(newUser);
};

export const issueToken = (user: User): LoginResult => {
  const expiresIn = getConfig().accessTokenExpireMinutes * 60;
  const token = jsonwebtoken.sign({ email: user.email }, getJwtSecret(), {
    subject: user.id,
    expiresIn,
    algorithm: 'HS256',
  });
  return { token, tokenType: 'bearer', expiresIn };
};

export const login = async (email: string, password: string): Promise<LoginResult> => {
  // Find user by email
  const user = findUserByEmail(email);
  if (!user) {
    await bcryptjs.compare(password, await getDummyHash());
    throw new InvalidCredentials();
  }

  // Compare password
  const isMatch = await bcryptjs.compare(password, user.passwordHash);
  if (!isMatch || !user.isActive) {
    throw new InvalidCredentials();
  }

  logger.info(`User logged in: ${user.email}`);
  return issueToken(user);
};

/**
 * Turns a bearer token into the user it was issued for.
 * Every failure (absent, malformed, expired, bad signature, unknown user)
 * is reported as Unauthenticated.
 */
export const resolveCurrentUser = (token: string | undefined): User => {
  if (!token) {
    throw new Unauthenticated('Access denied, token missing.');
  }

  let decoded: string | JwtPayload;
  try {
    decoded = jsonwebtoken.verify(token, getJwtSecret(), { algorithms: ['HS256'] });
  } catch (error) {
    if (error instanceof jsonwebtoken.TokenExpiredError) {
      throw new Unauthenticated('Access denied, token expired.');
    }
    if (error instanceof jsonwebtoken.JsonWebTokenError) {
      throw new Unauthenticated('Invalid token.');
    }
    throw error;
  }

  // Token must name a live user
  if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
    throw new Unauthenticated('Invalid token.');
  }

  const user = findUserById(decoded.sub);
  if (!user || !user.isActive) {
    throw new Unauthenticated('Invalid token.');
  }
  return user;
};

export const getProfile = (userId: string): UserProfile => {
  const user = findUserById(userId);
  if (!user) {
    throw new NotFound('User');
  }
  return toProfile(user);
};

export const updateProfile = (userId: string, updateData: UpdateProfileInput): UserProfile => {
  const updated = updateUserProfile(userId, updateData);
  if (!updated) {
    throw new NotFound('User');
  }
  return toProfile(updated);
};
