// src/api/contactRoutes.ts
import { Router, Response, NextFunction } from 'express';
import * as contactService from '../services/contactService';
import { CreateContactInput, UpdateContactInput } from '../models/contact.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import logger from '../utils/logger';
import { Body, optionalString, parsePagination, queryString, requireBody, requireString } from './validation';

const router = Router();

router.use(authenticateJWT);

const parseCreateInput = (body: Body): CreateContactInput => ({
  name: requireString(body, 'name'),
  phone: optionalString(body, 'phone'),
  email: optionalString(body, 'email'),
  note: optionalString(body, 'note'),
});

const parseUpdateInput = (body: Body): UpdateContactInput => ({
  name: body.name !== undefined ? requireString(body, 'name') : undefined,
  phone: optionalString(body, 'phone'),
  email: optionalString(body, 'email'),
  note: optionalString(body, 'note'),
});

// GET / (list, optional ?search=)
router.get('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const result = contactService.listContacts(getAuthUserId(req), {
      ...parsePagination(req.query),
      search: queryString(req.query, 'search'),
    });
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

// POST /
router.post('/', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const contact = contactService.createContact(userId, parseCreateInput(requireBody(req.body)));
    logger.info(`POST /contacts - Contact ${contact.id} created for user ${userId}`);
    res.status(201).json(contact);
  } catch (error) {
    next(error);
  }
});

// GET /:id
router.get('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    res.status(200).json(contactService.getContact(getAuthUserId(req), req.params.id));
  } catch (error) {
    next(error);
  }
});

// PATCH /:id
router.patch('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const contact = contactService.updateContact(userId, req.params.id, parseUpdateInput(requireBody(req.body)));
    logger.info(`PATCH /contacts/${contact.id} - Updated for user ${userId}`);
    res.status(200).json(contact);
  } catch (error) {
    next(error);
  }
});

// DELETE /:id; refused while transactions reference the contact
router.delete('/:id', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    contactService.deleteContact(userId, req.params.id);
    logger.info(`DELETE /contacts/${req.params.id} - Deleted for user ${userId}`);
    res.status(204).send();
  } catch (error) {
    next(error);
  }
});

export default router;
