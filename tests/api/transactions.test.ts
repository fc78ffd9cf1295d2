// tests/api/transactions.test.ts
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/index';
import { clearAllTables } from '../../src/database';
import { signUp } from '../helpers/session';

let app: Express;
let auth: string;

const post = (body: Record<string, unknown>, as = auth) =>
  request(app).post('/api/v1/transactions').set('Authorization', as).send(body);

describe('Transaction Endpoints API', () => {
  beforeAll(() => {
    app = createApp();
  });

  beforeEach(async () => {
    clearAllTables();
    ({ auth } = await signUp(app, 'owner@example.com'));
  });

  describe('POST /api/v1/transactions', () => {
    it('should record a personal expense', async () => {
      const res = await post({ amount: 12.5, type: 'expense', account: 'cash', description: 'Lunch' });
      expect(res.statusCode).toEqual(201);
      expect(res.body.amount).toBe(12.5);
      expect(res.body.type).toBe('expense');
      expect(res.body.contactId).toBeNull();
      expect(res.body.status).toBeNull();
      expect(res.body.remainingAmount).toBeNull();
    });

    it('should open a debt and create the contact by name', async () => {
      const res = await post({ amount: 100, type: 'loan_receivable', account: 'cash', description: 'Lent', contactName: 'Carol' });
      expect(res.statusCode).toEqual(201);
      expect(res.body.status).toBe('open');
      expect(res.body.remainingAmount).toBe(100);

      const contacts = await request(app).get('/api/v1/contacts').set('Authorization', auth);
      expect(contacts.body.total).toBe(1);
      expect(contacts.body.contacts[0].name).toBe('Carol');
      expect(contacts.body.contacts[0].id).toBe(res.body.contactId);
    });

    it.each([
      [{ amount: 0, type: 'expense', description: 'Zero' }, 'amount must be greater than zero.'],
      [{ amount: -5, type: 'expense', description: 'Negative' }, 'amount must be greater than zero.'],
      [{ amount: 5, type: 'gift', description: 'Unknown type' }, expect.stringContaining('type must be one of')],
      [{ amount: 0.004, type: 'loan_receivable', description: 'Sub-cent' }, 'amount must be a whole number of cents.'],
      [{ amount: 10.005, type: 'expense', description: 'Half cent' }, 'amount must be a whole number of cents.'],
      [{ amount: 5, type: 'expense' }, 'description is required and must be a string.'],
    ])('should reject %j', async (body, message) => {
      const res = await post(body);
      expect(res.statusCode).toEqual(400);
      expect(res.body.error).toBe('ValidationError');
      expect(res.body.message).toEqual(message);
    });

    it('should return 404 for a contact id the user does not own', async () => {
      const res = await post({ amount: 5, type: 'expense', description: 'x', contactId: 'missing-contact' });
      expect(res.statusCode).toEqual(404);
      expect(res.body).toEqual({ error: 'NotFound', message: 'Contact not found.' });
    });

    it('should split a payment FIFO across the contact debts', async () => {
      const older = await post({ amount: 40, type: 'loan_receivable', description: 'First loan', contactName: 'Erin', occurredAt: '2024-01-01' });
      const newer = await post({ amount: 60, type: 'loan_receivable', description: 'Second loan', contactName: 'Erin', occurredAt: '2024-02-01' });

      const payment = await post({ amount: 70, type: 'payment_received', description: 'Repaid', contactName: 'erin', occurredAt: '2024-03-01' });
      expect(payment.statusCode).toEqual(201);
      expect(payment.body.amount).toBe(40);
      expect(payment.body.linkedTransactionId).toBe(older.body.id);

      const first = await request(app).get(`/api/v1/transactions/${older.body.id}`).set('Authorization', auth);
      expect(first.body.status).toBe('settled');
      expect(first.body.remainingAmount).toBe(0);

      const second = await request(app).get(`/api/v1/transactions/${newer.body.id}`).set('Authorization', auth);
      expect(second.body.status).toBe('partial');
      expect(second.body.remainingAmount).toBe(30);

      const payments = await request(app).get(`/api/v1/transactions/${newer.body.id}/payments`).set('Authorization', auth);
      expect(payments.statusCode).toEqual(200);
      expect(payments.body).toHaveLength(1);
      expect(payments.body[0].amount).toBe(30);
    });

    it('should give the amount back to the debt when a payment is deleted', async () => {
      const debt = await post({ amount: 50, type: 'credit_payable', description: 'Supplies', contactName: 'Supplier' });
      const payment = await post({ amount: 20, type: 'payment_made', description: 'Part', contactName: 'Supplier' });

      const del = await request(app).delete(`/api/v1/transactions/${payment.body.id}`).set('Authorization', auth);
      expect(del.statusCode).toEqual(204);

      const restored = await request(app).get(`/api/v1/transactions/${debt.body.id}`).set('Authorization', auth);
      expect(restored.body.remainingAmount).toBe(50);
      expect(restored.body.status).toBe('open');
    });
  });

  describe('GET /api/v1/transactions/balances', () => {
    it('should net lent 100 and borrowed 30 to 70 owed to the user', async () => {
      await post({ amount: 100, type: 'loan_receivable', description: 'Lent', contactName: 'Carol' });
      await post({ amount: 30, type: 'loan_payable', description: 'Borrowed', contactName: 'carol' });

      const res = await request(app).get('/api/v1/transactions/balances').set('Authorization', auth);
      expect(res.statusCode).toEqual(200);
      expect(res.body).toEqual([
        { contactId: expect.any(String), contactName: 'Carol', netAmount: 70, status: 'owed_to_you' },
      ]);
    });

    it('should hide settled contacts unless asked for them', async () => {
      await post({ amount: 25, type: 'loan_receivable', description: 'Lent', contactName: 'Dan' });
      await post({ amount: 25, type: 'payment_received', description: 'Repaid', contactName: 'Dan' });

      const hidden = await request(app).get('/api/v1/transactions/balances').set('Authorization', auth);
      expect(hidden.body).toEqual([]);

      const shown = await request(app).get('/api/v1/transactions/balances?includeSettled=true').set('Authorization', auth);
      expect(shown.body).toHaveLength(1);
      expect(shown.body[0].netAmount).toBe(0);
      expect(shown.body[0].status).toBe('settled');
    });
  });

  describe('GET /api/v1/transactions/open-debts', () => {
    it('should exclude every transaction of a contact whose balance is zero', async () => {
      const carol = await post({ amount: 100, type: 'loan_receivable', description: 'Lent', contactName: 'Carol' });
      await post({ amount: 50, type: 'loan_receivable', description: 'Lent', contactName: 'Dan' });
      await post({ amount: 50, type: 'payment_received', description: 'Repaid', contactName: 'Dan' });

      const res = await request(app).get('/api/v1/transactions/open-debts').set('Authorization', auth);
      expect(res.statusCode).toEqual(200);
      expect(res.body.map((tx: { id: string }) => tx.id)).toEqual([carol.body.id]);
    });
  });

  describe('GET /api/v1/transactions/summary', () => {
    it('should total liquidity, receivables and payables', async () => {
      await post({ amount: 500, type: 'income', account: 'bank', description: 'Salary' });
      await post({ amount: 20, type: 'expense', account: 'cash', description: 'Taxi' });
      await post({ amount: 100, type: 'loan_receivable', account: 'bank', description: 'Lent', contactName: 'Carol' });
      await post({ amount: 40, type: 'payment_received', account: 'cash', description: 'Repaid', contactName: 'Carol' });

      const res = await request(app).get('/api/v1/transactions/summary').set('Authorization', auth);
      expect(res.statusCode).toEqual(200);
      expect(res.body).toEqual({ cash: 20, bank: 400, credit: 60, loan: 0 });
    });
  });

  describe('GET /api/v1/transactions', () => {
    it('should list newest first with a total and filters', async () => {
      await post({ amount: 1, type: 'expense', description: 'old', occurredAt: '2024-01-01' });
      await post({ amount: 2, type: 'income', description: 'new', occurredAt: '2024-06-01' });
      await post({ amount: 3, type: 'expense', description: 'mid', occurredAt: '2024-03-01' });

      const all = await request(app).get('/api/v1/transactions').set('Authorization', auth);
      expect(all.body.total).toBe(3);
      expect(all.body.transactions.map((tx: { description: string }) => tx.description)).toEqual(['new', 'mid', 'old']);

      const page = await request(app).get('/api/v1/transactions?skip=1&limit=1').set('Authorization', auth);
      expect(page.body.total).toBe(3);
      expect(page.body.transactions.map((tx: { description: string }) => tx.description)).toEqual(['mid']);

      const expenses = await request(app).get('/api/v1/transactions?type=expense').set('Authorization', auth);
      expect(expenses.body.total).toBe(2);
    });

    it('should reject a limit above 500', async () => {
      const res = await request(app).get('/api/v1/transactions?limit=501').set('Authorization', auth);
      expect(res.statusCode).toEqual(400);
      expect(res.body.message).toBe('Query parameter limit must be an integer between 1 and 500.');
    });
  });

  describe('PATCH /api/v1/transactions/:id', () => {
    it('should update fields and keep an untouched debt in step with its amount', async () => {
      const debt = await post({ amount: 80, type: 'loan_payable', description: 'Borrowed', contactName: 'Frank' });
      const res = await request(app)
        .patch(`/api/v1/transactions/${debt.body.id}`)
        .set('Authorization', auth)
        .send({ amount: 90, description: 'Borrowed more' });
      expect(res.statusCode).toEqual(200);
      expect(res.body.amount).toBe(90);
      expect(res.body.remainingAmount).toBe(90);
      expect(res.body.description).toBe('Borrowed more');
    });

    it('should refuse an amount below what has already been paid', async () => {
      const debt = await post({ amount: 100, type: 'loan_receivable', description: 'Lent', contactName: 'Gina' });
      await post({ amount: 30, type: 'payment_received', description: 'Part back', contactName: 'Gina' });

      const tooLow = await request(app)
        .patch(`/api/v1/transactions/${debt.body.id}`)
        .set('Authorization', auth)
        .send({ amount: 20 });
      expect(tooLow.statusCode).toEqual(400);
      expect(tooLow.body.message).toBe('amount cannot be less than what has already been paid.');

      const res = await request(app)
        .patch(`/api/v1/transactions/${debt.body.id}`)
        .set('Authorization', auth)
        .send({ amount: 50 });
      expect(res.statusCode).toEqual(200);
      expect(res.body.remainingAmount).toBe(20);
      expect(res.body.status).toBe('partial');
    });

    it('should refuse to link a transaction to itself', async () => {
      const tx = await post({ amount: 5, type: 'expense', description: 'x' });
      const res = await request(app)
        .patch(`/api/v1/transactions/${tx.body.id}`)
        .set('Authorization', auth)
        .send({ linkedTransactionId: tx.body.id });
      expect(res.statusCode).toEqual(400);
      expect(res.body.message).toBe('A transaction cannot be linked to itself.');
    });
  });

  describe('Isolation between users', () => {
    it('should never expose one user transactions to another', async () => {
      const mine = await post({ amount: 100, type: 'loan_receivable', description: 'Lent', contactName: 'Carol' });
      const other = await signUp(app, 'other@example.com');

      const get = await request(app).get(`/api/v1/transactions/${mine.body.id}`).set('Authorization', other.auth);
      expect(get.statusCode).toEqual(404);

      const patch = await request(app)
        .patch(`/api/v1/transactions/${mine.body.id}`)
        .set('Authorization', other.auth)
        .send({ amount: 1 });
      expect(patch.statusCode).toEqual(404);

      const del = await request(app).delete(`/api/v1/transactions/${mine.body.id}`).set('Authorization', other.auth);
      expect(del.statusCode).toEqual(404);

      const list = await request(app).get('/api/v1/transactions').set('Authorization', other.auth);
      expect(list.body).toEqual({ transactions: [], total: 0 });

      const balances = await request(app).get('/api/v1/transactions/balances').set('Authorization', other.auth);
      expect(balances.body).toEqual([]);
    });

    it('should require authentication', async () => {
      const res = await request(app).get('/api/v1/transactions');
      expect(res.statusCode).toEqual(401);
      expect(res.body.error).toBe('Unauthenticated');
    });
  });
});
