// tests/api/budgets.test.ts
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/index';
import { clearAllTables } from '../../src/database';
import { signUp } from '../helpers/session';

let app: Express;
let auth: string;

const createBudget = (body: Record<string, unknown>, as = auth) =>
  request(app).post('/api/v1/budgets').set('Authorization', as).send(body);

describe('Budget Endpoints API', () => {
  beforeAll(() => {
    app = createApp();
  });

  beforeEach(async () => {
    clearAllTables();
    ({ auth } = await signUp(app, 'owner@example.com'));
  });

  it('should create a spending limit with its current progress', async () => {
    await request(app)
      .post('/api/v1/transactions')
      .set('Authorization', auth)
      .send({ amount: 30, type: 'expense', description: 'Market', category: 'groceries' });

    const res = await createBudget({ name: 'Groceries', type: 'spending_limit', category: 'Groceries', amount: 120 });
    expect(res.statusCode).toEqual(201);
    expect(res.body).toEqual(
      expect.objectContaining({
        name: 'Groceries',
        type: 'spending_limit',
        period: 'monthly',
        alertAtPercent: 80,
        isActive: true,
        currentAmount: 30,
        progressPercent: 25,
        isOverBudget: false,
        status: 'on_track',
      })
    );
  });

  it.each([
    [{ type: 'income_goal', amount: 10 }, 'name is required and must be a string.'],
    [{ name: 'x', type: 'dream', amount: 10 }, 'type must be one of: spending_limit, income_goal, savings_goal, profit_goal.'],
    [{ name: 'x', type: 'income_goal', amount: 0 }, 'amount must be greater than zero.'],
    [{ name: 'x', type: 'income_goal', amount: 10, period: 'daily' }, 'period must be one of: weekly, monthly, yearly.'],
    [{ name: 'x', type: 'income_goal', amount: 10, alertAtPercent: 150 }, 'alertAtPercent must be a number greater than 0 and at most 100.'],
  ])('should reject %j', async (body, message) => {
    const res = await createBudget(body);
    expect(res.statusCode).toEqual(400);
    expect(res.body).toEqual({ error: 'ValidationError', message });
  });

  it('should update, list and delete a budget', async () => {
    const created = await createBudget({ name: 'Save', type: 'savings_goal', amount: 200 });

    const patched = await request(app)
      .patch(`/api/v1/budgets/${created.body.id}`)
      .set('Authorization', auth)
      .send({ name: 'Save more', period: 'yearly', isActive: false });
    expect(patched.statusCode).toEqual(200);
    expect(patched.body.name).toBe('Save more');
    expect(patched.body.period).toBe('yearly');
    expect(patched.body.isActive).toBe(false);

    const retype = await request(app)
      .patch(`/api/v1/budgets/${created.body.id}`)
      .set('Authorization', auth)
      .send({ type: 'income_goal' });
    expect(retype.statusCode).toEqual(400);
    expect(retype.body.message).toBe('type cannot be changed.');

    const listed = await request(app).get('/api/v1/budgets').set('Authorization', auth);
    expect(listed.body.map((b: { id: string }) => b.id)).toEqual([created.body.id]);

    const del = await request(app).delete(`/api/v1/budgets/${created.body.id}`).set('Authorization', auth);
    expect(del.statusCode).toEqual(204);
    const gone = await request(app).get(`/api/v1/budgets/${created.body.id}`).set('Authorization', auth);
    expect(gone.statusCode).toEqual(404);
    expect(gone.body).toEqual({ error: 'NotFound', message: 'Budget not found.' });
  });

  it('should not expose budgets to other users', async () => {
    const created = await createBudget({ name: 'Mine', type: 'income_goal', amount: 10 });
    const { auth: other } = await signUp(app, 'other@example.com');

    const res = await request(app).get(`/api/v1/budgets/${created.body.id}`).set('Authorization', other);
    expect(res.statusCode).toEqual(404);
    const listed = await request(app).get('/api/v1/budgets').set('Authorization', other);
    expect(listed.body).toEqual([]);
  });

  it('should require authentication', async () => {
    const res = await request(app).get('/api/v1/budgets');
    expect(res.statusCode).toEqual(401);
  });
});
