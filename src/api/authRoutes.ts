// src/api/authRoutes.ts
import { Router, Request, Response, NextFunction } from 'express';
import * as authService from '../services/authService';
import { UpdateProfileInput } from '../models/user.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import { ValidationError } from '../utils/errors';
import { Body, optionalString, requireBody } from './validation';
import logger from '../utils/logger';

const router = Router();

// Missing or non-string credentials reach the service as '' and fail its checks.
const credentialField = (body: Body, field: string): string => {
  const value = body[field];
  return typeof value === 'string' ? value : '';
};

// A currency is a three-letter code, a language a short tag such as "en" or "pt-BR".
const CURRENCY_PATTERN = /^[A-Za-z]{3}$/;
const LANGUAGE_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

const parseProfilePatch = (body: Body): UpdateProfileInput => {
  const patch: UpdateProfileInput = {};
  const fullName = optionalString(body, 'fullName');
  if (fullName !== undefined) {
    patch.fullName = fullName;
  }
  const currency = optionalString(body, 'preferredCurrency');
  if (currency !== undefined) {
    if (currency === null || !CURRENCY_PATTERN.test(currency)) {
      throw new ValidationError('preferredCurrency must be a three-letter currency code.');
    }
    patch.preferredCurrency = currency.toUpperCase();
  }
  const language = optionalString(body, 'preferredLanguage');
  if (language !== undefined) {
    if (language === null || !LANGUAGE_PATTERN.test(language)) {
      throw new ValidationError('preferredLanguage must be a language tag such as "en".');
    }
    patch.preferredLanguage = language;
  }
  return patch;
};

// POST /register
router.post('/register', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const body = requireBody(req.body);
    // Shape checks and the duplicate check live in the service
    const profile = await authService.register({
      email: credentialField(body, 'email'),
      password: credentialField(body, 'password'),
      fullName: optionalString(body, 'fullName'),
    });
    res.status(201).json({ userId: profile.id, email: profile.email });
  } catch (error) {
    next(error);
  }
});

// POST /login
router.post('/login', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
  try {
    const body = requireBody(req.body);
    const result = await authService.login(credentialField(body, 'email'), credentialField(body, 'password'));
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

// GET /me
router.get('/me', authenticateJWT, async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(authService.getProfile(getAuthUserId(req)));
  } catch (error) {
    next(error);
  }
});

// PATCH /me
router.patch('/me', authenticateJWT, async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const profile = authService.updateProfile(userId, parseProfilePatch(requireBody(req.body)));
    logger.info(`PATCH /auth/me - Profile updated for user ${userId}`);
    res.status(200).json(profile);
  } catch (error) {
    next(error);
  }
});

export default router;
