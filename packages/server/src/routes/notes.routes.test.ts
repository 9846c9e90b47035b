import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app.js';
import { createMemoryStores, type MemoryStores } from '../test/memory-stores.js';
import { bearer, seedUser } from '../test/helpers.js';
import type { Note, User } from '../repositories/types.js';

describe('notes routes', () => {
  let stores: MemoryStores;
  let app: Express;
  let alice: User;
  let bob: User;
  let admin: User;

  const createNote = (owner: User, title: string, privacy: 'private' | 'public', content = 'Body'): Promise<Note> =>
    stores.notes.createWithAuthor({ title, content, privacy, createdByUserId: owner.id });

  beforeEach(async () => {
    stores = createMemoryStores();
    app = createApp(stores);
    alice = await seedUser(stores, 'alice');
    bob = await seedUser(stores, 'bob');
    admin = await seedUser(stores, 'admin', { role: 'admin' });
  });

  describe('POST /api/v1/notes', () => {
    it('stores a trimmed title with the creator as first author', async () => {
      const res = await request(app)
        .post('/api/v1/notes')
        .set('Authorization', bearer(alice))
        .send({ title: '  Hi  ', content: '  Some text ' });

      expect(res.status).toBe(201);
      expect(res.body).toMatchObject({
        title: 'Hi',
        content: 'Some text',
        privacy: 'private',
        created_by_user_id: alice.id,
      });
      expect(res.body.authors).toHaveLength(1);
      expect(res.body.authors[0]).toMatchObject({
        id: alice.id,
        username: 'alice',
        name: 'Alice',
        added_by_user_id: alice.id,
      });
      expect(stores.tables.notes.get(res.body.id)?.title).toBe('Hi');
    });

    it('rejects an empty title with 422', async () => {
      const res = await request(app)
        .post('/api/v1/notes')
        .set('Authorization', bearer(alice))
        .send({ title: '', content: 'Some text' });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({
        error: 'Validation error',
        details: [{ field: 'title', message: 'Title cannot be empty' }],
      });
      expect(stores.tables.notes.size).toBe(0);
    });

    it('rejects a whitespace-only content body', async () => {
      const res = await request(app)
        .post('/api/v1/notes')
        .set('Authorization', bearer(alice))
        .send({ title: 'Title', content: '   ' });

      expect(res.status).toBe(422);
      expect(res.body.details).toEqual([{ field: 'content', message: 'Content cannot be empty' }]);
    });

    it('requires authentication', async () => {
      const res = await request(app).post('/api/v1/notes').send({ title: 'Hi', content: 'x' });

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Missing authentication token' });
      expect(res.headers['www-authenticate']).toBe('Bearer');
    });
  });

  describe('GET /api/v1/notes/:id', () => {
    it('hides a private note from other users and anonymous callers', async () => {
      const note = await createNote(alice, 'Secret', 'private');

      const asBob = await request(app).get(`/api/v1/notes/${note.id}`).set('Authorization', bearer(bob));
      const anonymous = await request(app).get(`/api/v1/notes/${note.id}`);

      expect(asBob.status).toBe(403);
      expect(asBob.body).toEqual({ error: "You don't have permission to view this note" });
      expect(anonymous.status).toBe(403);
    });

    it('shows a private note to its author and to admins', async () => {
      const note = await createNote(alice, 'Secret', 'private');

      const asAlice = await request(app).get(`/api/v1/notes/${note.id}`).set('Authorization', bearer(alice));
      const asAdmin = await request(app).get(`/api/v1/notes/${note.id}`).set('Authorization', bearer(admin));

      expect(asAlice.status).toBe(200);
      expect(asAlice.body.title).toBe('Secret');
      expect(asAdmin.status).toBe(200);
    });

    it('serves a public note to anonymous callers', async () => {
      const note = await createNote(alice, 'Open', 'public');

      const res = await request(app).get(`/api/v1/notes/${note.id}`);

      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ id: note.id, title: 'Open', privacy: 'public' });
    });

    it('fails closed on an invalid token even for public notes', async () => {
      const note = await createNote(alice, 'Open', 'public');

      const res = await request(app)
        .get(`/api/v1/notes/${note.id}`)
        .set('Authorization', 'Bearer not-a-token');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Invalid or expired token' });
    });

    it('returns 404 for soft-deleted notes', async () => {
      const note = await createNote(alice, 'Gone', 'public');
      await stores.notes.softDelete(note.id);

      const res = await request(app).get(`/api/v1/notes/${note.id}`).set('Authorization', bearer(alice));

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: `Note with ID ${note.id} not found` });
    });
  });

  describe('GET /api/v1/notes', () => {
    beforeEach(async () => {
      await createNote(alice, 'Open', 'public');
      await createNote(alice, 'Closed', 'private');
      await createNote(bob, 'Bob private', 'private');
    });

    it('lists only public notes for anonymous callers', async () => {
      const res = await request(app).get('/api/v1/notes');

      expect(res.status).toBe(200);
      expect(res.body.notes.map((note: { title: string }) => note.title)).toEqual(['Open']);
      expect(res.body).toMatchObject({
        total: 1,
        page: 1,
        per_page: 10,
        has_next: false,
        has_prev: false,
      });
    });

    it('adds the caller\'s own private notes, newest first', async () => {
      const res = await request(app).get('/api/v1/notes').set('Authorization', bearer(alice));

      expect(res.body.total).toBe(2);
      expect(res.body.notes.map((note: { title: string }) => note.title)).toEqual(['Closed', 'Open']);
    });

    it('lists every note for admins', async () => {
      const res = await request(app).get('/api/v1/notes').set('Authorization', bearer(admin));

      expect(res.body.total).toBe(3);
    });

    it('applies privacy and creator filters', async () => {
      const privateOnly = await request(app)
        .get('/api/v1/notes?privacy=private')
        .set('Authorization', bearer(admin));
      const byBob = await request(app)
        .get(`/api/v1/notes?creator_id=${bob.id}`)
        .set('Authorization', bearer(admin));
      const anonymousPrivate = await request(app).get('/api/v1/notes?privacy=private');

      expect(privateOnly.body.total).toBe(2);
      expect(byBob.body.notes.map((note: { title: string }) => note.title)).toEqual(['Bob private']);
      expect(anonymousPrivate.body.total).toBe(0);
    });

    it('pages with skip and limit', async () => {
      const res = await request(app).get('/api/v1/notes?skip=1&limit=1').set('Authorization', bearer(admin));

      expect(res.body.notes.map((note: { title: string }) => note.title)).toEqual(['Closed']);
      expect(res.body).toMatchObject({ total: 3, page: 2, per_page: 1, has_next: true, has_prev: true });
    });

    it('rejects a limit above 100', async () => {
      const res = await request(app).get('/api/v1/notes?limit=101');

      expect(res.status).toBe(422);
      expect(res.body.details[0].field).toBe('limit');
    });

    it('rejects a skip beyond the addressable range', async () => {
      const res = await request(app).get('/api/v1/notes?skip=1e300');

      expect(res.status).toBe(422);
      expect(res.body.details[0].field).toBe('skip');
    });

    it('returns list items with a content preview and author count', async () => {
      await createNote(bob, 'Long', 'public', 'a'.repeat(150));

      const res = await request(app).get('/api/v1/notes?limit=1');

      expect(res.body.notes[0]).toMatchObject({
        title: 'Long',
        authors_count: 1,
        content_preview: `${'a'.repeat(100)}...`,
      });
      expect(res.body.notes[0].content).toBeUndefined();
    });
  });

  describe('GET /api/v1/notes/my', () => {
    it('lists notes the caller authors, including shared ones', async () => {
      await createNote(alice, 'Mine', 'private');
      const shared = await createNote(bob, 'Shared', 'private');
      await createNote(bob, 'Not mine', 'public');
      await stores.noteAuthors.add(shared.id, alice.id, bob.id);

      const res = await request(app).get('/api/v1/notes/my').set('Authorization', bearer(alice));

      expect(res.status).toBe(200);
      expect(res.body.total).toBe(2);
      expect(res.body.notes.map((note: { title: string }) => note.title)).toEqual(['Shared', 'Mine']);
    });

    it('requires authentication', async () => {
      const res = await request(app).get('/api/v1/notes/my');

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'Authentication required' });
    });
  });

  describe('PUT /api/v1/notes/:id', () => {
    it('lets authors edit and refuses everyone else', async () => {
      const note = await createNote(alice, 'Draft', 'public');

      const asBob = await request(app)
        .put(`/api/v1/notes/${note.id}`)
        .set('Authorization', bearer(bob))
        .send({ title: 'Hijacked' });
      const asAlice = await request(app)
        .put(`/api/v1/notes/${note.id}`)
        .set('Authorization', bearer(alice))
        .send({ title: ' Final ', privacy: 'private' });

      expect(asBob.status).toBe(403);
      expect(asBob.body).toEqual({ error: "You don't have permission to edit this note" });
      expect(asAlice.status).toBe(200);
      expect(asAlice.body).toMatchObject({ title: 'Final', privacy: 'private', content: 'Body' });
    });
  });

  describe('DELETE /api/v1/notes/:id', () => {
    it('soft-deletes for the creator', async () => {
      const note = await createNote(alice, 'Draft', 'private');

      const res = await request(app).delete(`/api/v1/notes/${note.id}`).set('Authorization', bearer(alice));

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ detail: 'Note deleted successfully' });
      expect(stores.tables.notes.get(note.id)?.deletedAt).toBeInstanceOf(Date);
    });

    it('removes the row when permanent, including a soft-deleted note', async () => {
      const note = await createNote(alice, 'Draft', 'private');
      await stores.notes.softDelete(note.id);

      const res = await request(app)
        .delete(`/api/v1/notes/${note.id}?permanent=true`)
        .set('Authorization', bearer(alice));

      expect(res.status).toBe(200);
      expect(stores.tables.notes.has(note.id)).toBe(false);
      expect(stores.tables.noteAuthors).toHaveLength(0);
    });

    it('refuses co-authors who are not the creator', async () => {
      const note = await createNote(alice, 'Draft', 'private');
      await stores.noteAuthors.add(note.id, bob.id, alice.id);

      const res = await request(app).delete(`/api/v1/notes/${note.id}`).set('Authorization', bearer(bob));

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "You don't have permission to delete this note" });
    });
  });

  describe('note authors', () => {
    let note: Note;

    beforeEach(async () => {
      note = await createNote(alice, 'Team note', 'private');
    });

    it('refuses to remove the last author and keeps the author list', async () => {
      const res = await request(app)
        .delete(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice))
        .send({ user_id: alice.id });

      expect(res.status).toBe(422);
      expect(res.body).toEqual({ error: 'Note validation error: Cannot remove the last author from a note' });

      const authors = await request(app)
        .get(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice));
      expect(authors.body.map((author: { id: number }) => author.id)).toEqual([alice.id]);
    });

    it('adds a co-author once', async () => {
      const first = await request(app)
        .post(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice))
        .send({ user_id: bob.id });
      const second = await request(app)
        .post(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice))
        .send({ user_id: bob.id });

      expect(first.status).toBe(201);
      expect(first.body).toEqual({ detail: 'Author added successfully' });
      expect(second.status).toBe(409);
      expect(second.body).toEqual({ error: `User ${bob.id} is already an author of note ${note.id}` });

      const asBob = await request(app).get(`/api/v1/notes/${note.id}`).set('Authorization', bearer(bob));
      expect(asBob.status).toBe(200);
      expect(asBob.body.authors.map((author: { id: number }) => author.id)).toEqual([alice.id, bob.id]);
      expect(asBob.body.authors[1].added_by_user_id).toBe(alice.id);
    });

    it('returns 404 when adding an unknown user', async () => {
      const res = await request(app)
        .post(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice))
        .send({ user_id: 999 });

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: 'User not found' });
    });

    it('refuses author management to non-authors', async () => {
      const res = await request(app)
        .post(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(bob))
        .send({ user_id: bob.id });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "You don't have permission to manage authors of this note" });
    });

    it('removes a co-author and reports unknown authors', async () => {
      await stores.noteAuthors.add(note.id, bob.id, alice.id);

      const removed = await request(app)
        .delete(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice))
        .send({ user_id: bob.id });
      const missing = await request(app)
        .delete(`/api/v1/notes/${note.id}/authors`)
        .set('Authorization', bearer(alice))
        .send({ user_id: bob.id });

      expect(removed.status).toBe(200);
      expect(removed.body).toEqual({ detail: 'Author removed successfully' });
      expect(missing.status).toBe(404);
      expect(missing.body).toEqual({ error: `User ${bob.id} is not an author of note ${note.id}` });
    });

    it('transfers ownership to an existing author only', async () => {
      const toStranger = await request(app)
        .post(`/api/v1/notes/${note.id}/transfer`)
        .set('Authorization', bearer(alice))
        .send({ new_creator_id: bob.id });
      expect(toStranger.status).toBe(404);
      expect(toStranger.body).toEqual({ error: `User ${bob.id} is not an author of note ${note.id}` });

      await stores.noteAuthors.add(note.id, bob.id, alice.id);
      const transferred = await request(app)
        .post(`/api/v1/notes/${note.id}/transfer`)
        .set('Authorization', bearer(alice))
        .send({ new_creator_id: bob.id });
      expect(transferred.status).toBe(200);
      expect(transferred.body.created_by_user_id).toBe(bob.id);

      const deleteByFormerCreator = await request(app)
        .delete(`/api/v1/notes/${note.id}`)
        .set('Authorization', bearer(alice));
      expect(deleteByFormerCreator.status).toBe(403);
    });

    it('refuses transfer by a co-author who is not the creator', async () => {
      await stores.noteAuthors.add(note.id, bob.id, alice.id);

      const res = await request(app)
        .post(`/api/v1/notes/${note.id}/transfer`)
        .set('Authorization', bearer(bob))
        .send({ new_creator_id: bob.id });

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "You don't have permission to transfer ownership of this note" });
    });
  });
});
