// src/api/aiRoutes.ts
import { Router, Response, NextFunction } from 'express';
import { parse } from '../services/aiParseService';
import { listOpenDebts } from '../services/balanceService';
import { getProfile } from '../services/authService';
import { ChatHistoryEntry, OpenDebtContext, ParseRequest, PendingDraftContext } from '../models/ai.types';
import { isDebtType } from '../models/transaction.types';
import { authenticateJWT, AuthenticatedRequest, getAuthUserId } from '../middleware/authMiddleware';
import logger from '../utils/logger';
import { Body, optionalRecordArray, optionalString, parseAttachment, requireBody, requireString } from './validation';

const router = Router();

router.use(authenticateJWT);

const stringField = (record: Body, field: string): string | undefined => {
  const value = record[field];
  return typeof value === 'string' ? value : undefined;
};

const numberField = (record: Body, field: string): number | undefined => {
  const value = record[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
};

const toHistoryEntry = (record: Body): ChatHistoryEntry => ({
  role: stringField(record, 'role') ?? 'user',
  content: stringField(record, 'content') ?? '',
});

const toPendingDraft = (record: Body): PendingDraftContext => ({
  type: stringField(record, 'type'),
  account: stringField(record, 'account'),
  amount: numberField(record, 'amount'),
  description: stringField(record, 'description'),
});

const toOpenDebt = (record: Body): OpenDebtContext => ({
  id: stringField(record, 'id') ?? '',
  contact: stringField(record, 'contact') ?? null,
  amount: numberField(record, 'amount') ?? 0,
  remainingAmount: numberField(record, 'remainingAmount') ?? null,
  type: stringField(record, 'type') ?? '',
});

/** Narrow symbol for an ISO 4217 code, or the code itself when unknown. */
export const currencySymbolFor = (code: string): string => {
  try {
    const part = new Intl.NumberFormat('en', { style: 'currency', currency: code, currencyDisplay: 'narrowSymbol' })
      .formatToParts(0)
      .find((p) => p.type === 'currency');
    return part ? part.value : code;
  } catch (error) {
    if (error instanceof RangeError) {
      return code;
    }
    throw error;
  }
};

// POST /parse
router.post('/parse', async (req: AuthenticatedRequest, res: Response, next: NextFunction): Promise<void> => {
  try {
    const userId = getAuthUserId(req);
    const body = requireBody(req.body);
    const profile = getProfile(userId);

    // Attachments can stand in for the text
    const attachmentItems = optionalRecordArray(body, 'attachments');
    const attachments = attachmentItems ? attachmentItems.map(parseAttachment) : [];
    const text =
      body.text === undefined && attachments.length > 0
        ? ''
        : requireString(body, 'text', { allowEmpty: attachments.length > 0 });

    const history = optionalRecordArray(body, 'history');
    const pendingDrafts = optionalRecordArray(body, 'pendingDrafts');
    const openDebts = optionalRecordArray(body, 'openDebts');
    // Currency and language default to the profile
    const currencyCode = optionalString(body, 'currencyCode') ?? profile.preferredCurrency;

    const request: ParseRequest = {
      text,
      attachments,
      history: history ? history.map(toHistoryEntry) : [],
      pendingDrafts: pendingDrafts ? pendingDrafts.map(toPendingDraft) : [],
      // Without caller-supplied debts, the user's unsettled debts give the model context.
      openDebts: openDebts
        ? openDebts.map(toOpenDebt)
        : listOpenDebts(userId)
            .filter((tx) => isDebtType(tx.type) && tx.status !== 'settled')
            .map((tx) => ({
              id: tx.id,
              contact: tx.contactName,
              amount: tx.amount,
              remainingAmount: tx.remainingAmount,
              type: tx.type,
            })),
      currencyCode,
      currencySymbol: optionalString(body, 'currencySymbol') ?? currencySymbolFor(currencyCode),
      languageCode: optionalString(body, 'languageCode') ?? profile.preferredLanguage,
    };

    const result = await parse(request);
    logger.info(`POST /ai/parse - ${result.transactions.length} transaction(s) extracted for user ${userId}`);
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

export default router;
