import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { type Express } from 'express';
import { createApp } from './app.js';
import { type AppConfig } from './config.js';
import { type AppContext, closeContext, createContext } from './context.js';
import { createLogger } from './logger.js';

const config: AppConfig = {
  nodeEnv: 'test',
  production: false,
  port: 0,
  databasePath: ':memory:',
  sessionSecret: 'test-secret',
  usingDevSecret: false,
  logLevel: 'error'
};

const coffee = { description: 'Coffee', amount: '3.50', date: '2024-01-15', category: 'Food' };

describe('HTTP routes', () => {
  let context: AppContext;
  let app: Express;

  beforeEach(() => {
    context = createContext(config, createLogger({ sink: { write: () => {} } }));
    app = createApp(context);
  });

  afterEach(() => {
    closeContext(context);
  });

  const signedIn = async (username: string) => {
    const agent = request.agent(app);
    await agent.post('/register').type('form').send({ username, password: 'test-secret' }).expect(303);
    await agent.post('/login').type('form').send({ username, password: 'test-secret' }).expect(303);
    return agent;
  };

  it('shows the landing page to anonymous visitors', async () => {
    const response = await request(app).get('/').expect(200);
    expect(response.body).toEqual({ view: 'home', messages: [] });
  });

  it('sends anonymous visitors of protected pages to the login form', async () => {
    const agent = request.agent(app);
    const response = await agent.get('/expenses').expect(303);
    expect(response.headers.location).toBe('/login');
    const login = await agent.get('/login').expect(200);
    expect(login.body).toEqual({
      view: 'login',
      messages: [{ category: 'danger', message: 'Please log in to access this page.' }]
    });
  });

  it('registers, refuses duplicates and logs in', async () => {
    const agent = request.agent(app);
    const registered = await agent.post('/register').type('form').send({ username: 'alice', password: 'test-secret' }).expect(303);
    expect(registered.headers.location).toBe('/login');

    const duplicate = await agent.post('/register').type('form').send({ username: 'alice', password: 'x' }).expect(303);
    expect(duplicate.headers.location).toBe('/register');
    const form = await agent.get('/register').expect(200);
    expect(form.body.messages).toEqual([
      { category: 'success', message: 'Registration successful! Please log in.' },
      { category: 'danger', message: 'Username already exists!' }
    ]);

    const rejected = await agent.post('/login').type('form').send({ username: 'alice', password: 'x' }).expect(303);
    expect(rejected.headers.location).toBe('/login');

    const accepted = await agent.post('/login').type('form').send({ username: 'alice', password: 'test-secret' }).expect(303);
    expect(accepted.headers.location).toBe('/expenses');
    const home = await agent.get('/').expect(303);
    expect(home.headers.location).toBe('/expenses');
  });

  it('adds, lists and exports an expense', async () => {
    const agent = await signedIn('alice');
    const added = await agent.post('/add').type('form').send(coffee).expect(303);
    expect(added.headers.location).toBe('/expenses');

    const listing = await agent.get('/expenses').expect(200);
    expect(listing.body.messages).toEqual([{ category: 'success', message: 'Expense added successfully!' }]);
    expect(listing.body.expenses).toEqual([
      { id: 1, description: 'Coffee', amount: 3.5, date: '2024-01-15', category: 'Food', userId: 1 }
    ]);

    const csv = await agent.get('/export').expect(200);
    expect(csv.headers['content-type']).toMatch(/^text\/csv/);
    expect(csv.headers['content-disposition']).toBe('attachment; filename=expenses.csv');
    expect(csv.text).toBe('Date,Description,Category,Amount\n2024-01-15,Coffee,Food,3.5\n');
  });

  it('rejects an unparsable amount and returns to the form', async () => {
    const agent = await signedIn('alice');
    const response = await agent.post('/add').type('form').send({ ...coffee, amount: 'abc' }).expect(303);
    expect(response.headers.location).toBe('/add');
    const form = await agent.get('/add').expect(200);
    expect(form.body.messages).toEqual([{ category: 'danger', message: 'Error adding expense: Amount must be a number' }]);
    const listing = await agent.get('/expenses').expect(200);
    expect(listing.body.expenses).toEqual([]);
  });

  it('filters by date and flags an invalid bound', async () => {
    const agent = await signedIn('alice');
    await agent.post('/add').type('form').send({ ...coffee, date: '2024-01-01' }).expect(303);
    await agent.post('/add').type('form').send({ ...coffee, date: '2024-02-01' }).expect(303);

    const bounded = await agent.get('/expenses').query({ start_date: '2024-01-15' }).expect(200);
    expect(bounded.body.expenses.map((item: { date: string }) => item.date)).toEqual(['2024-02-01']);

    const invalid = await agent.get('/expenses').query({ start_date: 'soon', end_date: '2024-01-31' }).expect(200);
    expect(invalid.body.messages).toEqual([{ category: 'danger', message: 'Invalid start date format. Use YYYY-MM-DD.' }]);
    expect(invalid.body.filters).toEqual({ endDate: '2024-01-31' });
    expect(invalid.body.expenses.map((item: { date: string }) => item.date)).toEqual(['2024-01-01']);
  });

  it('edits an expense and reports validation failures', async () => {
    const agent = await signedIn('alice');
    await agent.post('/add').type('form').send(coffee).expect(303);

    const form = await agent.get('/edit/1').expect(200);
    expect(form.body.view).toBe('edit_expense');
    expect(form.body.expense.description).toBe('Coffee');

    const invalid = await agent.post('/edit/1').type('form').send({ ...coffee, amount: 'lots' }).expect(303);
    expect(invalid.headers.location).toBe('/edit/1');
    const retry = await agent.get('/edit/1').expect(200);
    expect(retry.body.messages).toEqual([{ category: 'danger', message: 'Error updating expense: Amount must be a number' }]);

    await agent.post('/edit/1').type('form').send({ ...coffee, description: 'Espresso', amount: '2' }).expect(303);
    const listing = await agent.get('/expenses').expect(200);
    expect(listing.body.expenses[0]).toEqual({ id: 1, description: 'Espresso', amount: 2, date: '2024-01-15', category: 'Food', userId: 1 });
  });

  it('keeps other users away from an expense', async () => {
    const alice = await signedIn('alice');
    await alice.post('/add').type('form').send(coffee).expect(303);
    const bob = await signedIn('bob');

    const edit = await bob.get('/edit/1').expect(303);
    expect(edit.headers.location).toBe('/expenses');
    await bob.post('/edit/1').type('form').send({ ...coffee, description: 'Mine now' }).expect(303);
    const remove = await bob.get('/delete/1').expect(303);
    expect(remove.headers.location).toBe('/expenses');

    const bobListing = await bob.get('/expenses').expect(200);
    expect(bobListing.body.expenses).toEqual([]);
    expect(bobListing.body.messages).toEqual([
      { category: 'danger', message: 'You are not authorized to edit this expense.' },
      { category: 'danger', message: 'You are not authorized to edit this expense.' },
      { category: 'danger', message: 'You are not authorized to delete this expense.' }
    ]);

    const aliceListing = await alice.get('/expenses').expect(200);
    expect(aliceListing.body.expenses.map((item: { description: string }) => item.description)).toEqual(['Coffee']);
  });

  it('answers 404 for unknown or malformed ids', async () => {
    const agent = await signedIn('alice');
    const missing = await agent.get('/edit/999').expect(404);
    expect(missing.body).toEqual({ error: { code: 'NOT_FOUND', message: 'Expense not found' } });
    await agent.get('/delete/abc').expect(404);
  });

  it('deletes an expense', async () => {
    const agent = await signedIn('alice');
    await agent.post('/add').type('form').send(coffee).expect(303);
    await agent.get('/delete/1').expect(303);
    const listing = await agent.get('/expenses').expect(200);
    expect(listing.body.expenses).toEqual([]);
    expect(listing.body.messages).toEqual([
      { category: 'success', message: 'Expense added successfully!' },
      { category: 'success', message: 'Expense deleted successfully!' }
    ]);
  });

  it('serves dashboard series', async () => {
    const agent = await signedIn('alice');
    await agent.post('/add').type('form').send({ ...coffee, date: '2023-03-01', amount: '10' }).expect(303);
    await agent.post('/add').type('form').send({ ...coffee, date: '2024-03-10', amount: '20' }).expect(303);
    const response = await agent.get('/dashboard').expect(200);
    expect(response.body.view).toBe('dashboard');
    expect(response.body.labels).toEqual(['Food']);
    expect(response.body.values).toEqual([30]);
    expect(response.body.monthlyLabels).toEqual(['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec']);
    expect(response.body.monthlyData).toEqual([0, 0, 30, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
  });

  it('logs out and protects pages again', async () => {
    const agent = await signedIn('alice');
    const response = await agent.get('/logout').expect(303);
    expect(response.headers.location).toBe('/');
    const home = await agent.get('/').expect(200);
    expect(home.body).toEqual({ view: 'home', messages: [{ category: 'success', message: 'You have been logged out.' }] });
    const protectedPage = await agent.get('/expenses').expect(303);
    expect(protectedPage.headers.location).toBe('/login');
  });
});
