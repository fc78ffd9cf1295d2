// src/services/aiParseService.ts
import axios from 'axios';
import { getConfig } from '../config';
import {
  ChatHistoryEntry,
  OpenDebtContext,
  ParseRequest,
  ParseResult,
  ParsedTransaction,
  PendingDraftContext,
} from '../models/ai.types';
import { Attachment } from '../models/message.types';
import { TRANSACTION_TYPES } from '../models/transaction.types';
import { UpstreamUnavailable, ValidationError } from '../utils/errors';
import { isRecord } from '../utils/guards';
import logger from '../utils/logger';
import { logSafeError } from '../utils/safeLogger';

const HISTORY_WINDOW = 3;
const MEDIA_ONLY_PROMPT = 'Extract transactions from the attached media.';

type GeminiPart = { text: string } | { inlineData: { mimeType: string; data: string } };

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

const buildSystemInstruction = (today: string): string =>
  [
    'You turn short notes about money into bookkeeping entries.',
    `Today is ${today}. Resolve relative dates ("yesterday", "last Friday") against it and answer dates as YYYY-MM-DD.`,
    'Accounts: "cash" and "bank" hold the user\'s own money.',
    `Transaction types: ${TRANSACTION_TYPES.join(', ')}.`,
    '- income / expense: money in or out that settles nothing.',
    '- credit_receivable: the user sold on credit; the contact owes the user.',
    '- credit_payable: the user bought on credit; the user owes the contact.',
    '- loan_receivable: the user lent money to the contact.',
    '- loan_payable: the user borrowed money from the contact.',
    '- payment_received: the contact paid back something they owed.',
    '- payment_made: the user paid back something they owed.',
    'For loans and credit, fill interestRate (percent per year) and termMonths when the user states them.',
    'Attached images are receipts or notes; attached audio is the user speaking. Read the entries from them the same way.',
    'When a payment matches one of the open debts listed in context, set linkedTransactionId to that debt\'s ID; with several, pick the oldest.',
    'Never repeat an entry already listed as pending.',
    'When the message is a question rather than a record, set isQuestion and answer in questionResponse.',
    'When the message corrects the previous entries, set isCorrection.',
    'Write questionResponse in the user\'s language and say the entries were detected, not saved.',
    'Always answer with JSON only.',
  ].join('\n');

// JSON schema sent with the request so the provider answers in this shape.
const RESPONSE_SCHEMA = {
  type: 'OBJECT',
  properties: {
    transactions: {
      type: 'ARRAY',
      items: {
        type: 'OBJECT',
        properties: {
          amount: { type: 'NUMBER' },
          description: { type: 'STRING' },
          category: { type: 'STRING', nullable: true },
          type: { type: 'STRING', enum: [...TRANSACTION_TYPES] },
          account: { type: 'STRING', enum: ['cash', 'bank'] },
          contact: { type: 'STRING', nullable: true },
          date: { type: 'STRING', nullable: true },
          dueDate: { type: 'STRING', nullable: true },
          interestRate: { type: 'NUMBER', nullable: true },
          termMonths: { type: 'INTEGER', nullable: true },
          linkedTransactionId: { type: 'STRING', nullable: true },
        },
        required: ['amount', 'description', 'type', 'account'],
      },
    },
    isQuestion: { type: 'BOOLEAN' },
    questionResponse: { type: 'STRING', nullable: true },
    isCorrection: { type: 'BOOLEAN', nullable: true },
  },
  required: ['transactions', 'isQuestion'],
} as const;

const userTurn = (text: string): GeminiContent => ({ role: 'user', parts: [{ text }] });

// Base64 payload of a data URL; a bare payload is passed through.
const toInlinePart = (attachment: Attachment): GeminiPart | null => {
  const comma = attachment.dataUrl.indexOf(',');
  const data = comma >= 0 ? attachment.dataUrl.slice(comma + 1) : attachment.dataUrl;
  return data === '' ? null : { inlineData: { mimeType: attachment.mimeType, data } };
};

const describePendingDrafts = (drafts: PendingDraftContext[]): string =>
  drafts
    .map((d) => `[type:${d.type ?? '?'} | account:${d.account ?? '?'} | amount:${d.amount ?? '?'} | desc:${d.description ?? ''}]`)
    .join(' ');

const describeOpenDebts = (debts: OpenDebtContext[]): string =>
  debts
    .map((d) => `[ID:${d.id}] ${d.contact || 'Unknown'}: ${d.remainingAmount ?? d.amount} (${d.type})`)
    .join('; ');

export const buildContents = (request: ParseRequest): GeminiContent[] => {
  const contents: GeminiContent[] = [];

  const history: ChatHistoryEntry[] = request.history ?? [];
  for (const entry of history.slice(-HISTORY_WINDOW)) {
    contents.push({ role: entry.role === 'user' ? 'user' : 'model', parts: [{ text: entry.content }] });
  }

  if (request.pendingDrafts && request.pendingDrafts.length > 0) {
    contents.push(userTurn(`[Context: pending entries, do not duplicate: ${describePendingDrafts(request.pendingDrafts)}]`));
  }
  if (request.openDebts && request.openDebts.length > 0) {
    contents.push(userTurn(`[Open debts: ${describeOpenDebts(request.openDebts)}]`));
  }

  contents.push(userTurn(`[Currency: ${request.currencyCode ?? 'USD'} (${request.currencySymbol ?? '$'})]`));
  contents.push(userTurn(`[Language: ${request.languageCode ?? 'en'}]`));

  // Media first, then the text, in the same turn.
  const parts: GeminiPart[] = [];
  for (const attachment of request.attachments ?? []) {
    const part = toInlinePart(attachment);
    if (part) {
      parts.push(part);
    }
  }
  const text = request.text.trim();
  parts.push({ text: text === '' && parts.length > 0 ? MEDIA_ONLY_PROMPT : text });
  contents.push({ role: 'user', parts });
  return contents;
};

const stringOrNull = (value: unknown): string | null => (typeof value === 'string' && value !== '' ? value : null);

const numberOrNull = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const toParsedTransaction = (raw: Record<string, unknown>): ParsedTransaction => {
  const amount = typeof raw.amount === 'number' ? raw.amount : Number(raw.amount);
  return {
    amount: Number.isFinite(amount) ? amount : 0,
    description: typeof raw.description === 'string' ? raw.description : '',
    category: stringOrNull(raw.category),
    type: stringOrNull(raw.type) ?? 'expense',
    account: stringOrNull(raw.account) ?? 'cash',
    contact: stringOrNull(raw.contact),
    date: stringOrNull(raw.date),
    dueDate: stringOrNull(raw.dueDate),
    interestRate: numberOrNull(raw.interestRate),
    termMonths: typeof raw.termMonths === 'number' && Number.isInteger(raw.termMonths) ? raw.termMonths : null,
    linkedTransactionId: stringOrNull(raw.linkedTransactionId),
  };
};

/** Shapes whatever JSON the provider returned into a ParseResult. */
export const normalizeParseResult = (raw: Record<string, unknown>): ParseResult => ({
  transactions: Array.isArray(raw.transactions) ? raw.transactions.filter(isRecord).map(toParsedTransaction) : [],
  isQuestion: raw.isQuestion === true,
  questionResponse: stringOrNull(raw.questionResponse),
  isCorrection: typeof raw.isCorrection === 'boolean' ? raw.isCorrection : null,
});

// candidates[0].content.parts[*].text of a generateContent response.
const extractText = (body: unknown): string | null => {
  if (!isRecord(body) || !Array.isArray(body.candidates)) {
    return null;
  }
  const first: unknown = body.candidates[0];
  if (!isRecord(first) || !isRecord(first.content) || !Array.isArray(first.content.parts)) {
    return null;
  }
  const text = first.content.parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .join('');
  return text.trim() === '' ? null : text;
};

const isTimeout = (error: unknown): boolean =>
  isRecord(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');

/**
 * Sends the text and its context to the language model once and returns the
 * entries it extracted. Any provider failure is reported as UpstreamUnavailable.
 */
export const parse = async (request: ParseRequest): Promise<ParseResult> => {
  const hasMedia = (request.attachments ?? []).some((attachment) => toInlinePart(attachment) !== null);
  if (request.text.trim() === '' && !hasMedia) {
    throw new ValidationError('Text is required.');
  }

  // Provider configuration
  const { gemini } = getConfig();
  if (!gemini.apiKey) {
    throw new UpstreamUnavailable('The AI provider is not configured.');
  }

  const url = `${gemini.baseUrl}/v1beta/models/${gemini.model}:generateContent`;
  const body = {
    systemInstruction: { parts: [{ text: buildSystemInstruction(new Date().toISOString().slice(0, 10)) }] },
    contents: buildContents(request),
    generationConfig: {
      responseMimeType: 'application/json',
      responseSchema: RESPONSE_SCHEMA,
    },
  };

  let responseBody: unknown;
  try {
    const response = await axios.post<unknown>(url, body, {
      timeout: gemini.timeoutMs,
      headers: { 'Content-Type': 'application/json', 'x-goog-api-key': gemini.apiKey },
    });
    responseBody = response.data;
  } catch (error) {
    logSafeError(logger, 'AI provider request failed', error, { model: gemini.model });
    if (isTimeout(error)) {
      throw new UpstreamUnavailable('The AI provider did not answer in time.');
    }
    throw new UpstreamUnavailable();
  }

  // Parse the answer
  const text = extractText(responseBody);
  if (text === null) {
    logger.warn(`AI provider returned no text (model ${gemini.model}).`);
    throw new UpstreamUnavailable('The AI provider returned an empty answer.');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    logSafeError(logger, 'AI provider answer is not JSON', error);
    throw new UpstreamUnavailable('The AI provider returned an unreadable answer.');
  }
  if (!isRecord(parsed)) {
    throw new UpstreamUnavailable('The AI provider returned an unreadable answer.');
  }

  const result = normalizeParseResult(parsed);
  logger.info(`AI parse produced ${result.transactions.length} transaction(s).`);
  return result;
};
