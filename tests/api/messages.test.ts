// tests/api/messages.test.ts
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/index';
import { clearAllTables } from '../../src/database';
import { signUp } from '../helpers/session';

let app: Express;
let auth: string;

const send = (body: Record<string, unknown>, as = auth) =>
  request(app).post('/api/v1/messages').set('Authorization', as).send(body);

describe('Message Endpoints API', () => {
  beforeAll(() => {
    app = createApp();
  });

  beforeEach(async () => {
    clearAllTables();
    ({ auth } = await signUp(app, 'owner@example.com'));
  });

  it('should store a message with drafts and attachments', async () => {
    const res = await send({
      role: 'user',
      content: 'Lunch 12',
      drafts: [{ amount: 12, type: 'expense' }],
      attachments: [{ id: 'a1', type: 'image', mimeType: 'image/png', dataUrl: 'data:image/png;base64,AAAA', name: 'receipt.png' }],
    });
    expect(res.statusCode).toEqual(201);
    expect(res.body.role).toBe('user');
    expect(res.body.drafts).toEqual([{ amount: 12, type: 'expense' }]);
    expect(res.body.attachments).toEqual([
      { id: 'a1', type: 'image', mimeType: 'image/png', dataUrl: 'data:image/png;base64,AAAA', name: 'receipt.png' },
    ]);

    const fetched = await request(app).get(`/api/v1/messages/${res.body.id}`).set('Authorization', auth);
    expect(fetched.body).toEqual(res.body);
  });

  it('should reject an unknown role and empty content', async () => {
    const badRole = await send({ role: 'system', content: 'hi' });
    expect(badRole.statusCode).toEqual(400);
    expect(badRole.body.message).toBe('role must be one of: user, assistant.');

    const empty = await send({ role: 'user', content: '   ' });
    expect(empty.statusCode).toEqual(400);
    expect(empty.body.message).toBe('content must not be empty.');
  });

  it('should reject an attachment of an unknown type', async () => {
    const res = await send({
      role: 'user',
      content: 'file',
      attachments: [{ id: 'a1', type: 'video', mimeType: 'video/mp4', dataUrl: 'data:video/mp4;base64,AA' }],
    });
    expect(res.statusCode).toEqual(400);
    expect(res.body.message).toBe('type must be one of: image, audio.');
  });

  it('should list oldest first and page through the conversation', async () => {
    await send({ role: 'user', content: 'first' });
    await send({ role: 'assistant', content: 'second' });
    await send({ role: 'user', content: 'third' });

    const all = await request(app).get('/api/v1/messages').set('Authorization', auth);
    expect(all.body.total).toBe(3);
    expect(all.body.messages.map((m: { content: string }) => m.content)).toEqual(['first', 'second', 'third']);

    const page = await request(app).get('/api/v1/messages?skip=2&limit=5').set('Authorization', auth);
    expect(page.body.messages.map((m: { content: string }) => m.content)).toEqual(['third']);
  });

  it('should update the content of a message', async () => {
    const created = await send({ role: 'assistant', content: 'Detected 1 entry.' });
    const res = await request(app)
      .patch(`/api/v1/messages/${created.body.id}`)
      .set('Authorization', auth)
      .send({ content: 'Detected 2 entries.' });
    expect(res.statusCode).toEqual(200);
    expect(res.body.content).toBe('Detected 2 entries.');
    expect(res.body.role).toBe('assistant');
  });

  it('should delete one message and clear the rest without touching other users', async () => {
    const first = await send({ role: 'user', content: 'first' });
    await send({ role: 'user', content: 'second' });
    const other = await signUp(app, 'other@example.com');
    await send({ role: 'user', content: 'theirs' }, other.auth);

    const del = await request(app).delete(`/api/v1/messages/${first.body.id}`).set('Authorization', auth);
    expect(del.statusCode).toEqual(204);

    const clear = await request(app).delete('/api/v1/messages').set('Authorization', auth);
    expect(clear.statusCode).toEqual(204);

    const mine = await request(app).get('/api/v1/messages').set('Authorization', auth);
    expect(mine.body).toEqual({ messages: [], total: 0 });

    const theirs = await request(app).get('/api/v1/messages').set('Authorization', other.auth);
    expect(theirs.body.total).toBe(1);
    expect(theirs.body.messages[0].content).toBe('theirs');
  });

  it('should not let another user read a message', async () => {
    const created = await send({ role: 'user', content: 'private' });
    const other = await signUp(app, 'other@example.com');
    const res = await request(app).get(`/api/v1/messages/${created.body.id}`).set('Authorization', other.auth);
    expect(res.statusCode).toEqual(404);
    expect(res.body).toEqual({ error: 'NotFound', message: 'Message not found.' });
  });
});
