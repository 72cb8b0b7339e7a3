/**
 * Unit tests for the access guard
 */

import express, { type Request, type Response } from 'express';
import request from 'supertest';
import { classifyCaller, requireTrustedCaller } from '../../../src/server/middleware/access-guard.js';

describe('classifyCaller', () => {
  it('admits a bot caller', () => {
    expect(classifyCaller('DiscordBot sometoken')).toEqual({
      ok: true,
      caller: { tier: 'bot', token: 'sometoken' },
    });
  });

  it('admits a guild caller', () => {
    expect(classifyCaller('DiscordGuild 613425648685547541')).toEqual({
      ok: true,
      caller: { tier: 'guild', guildId: '613425648685547541' },
    });
  });

  it('tolerates surrounding and repeated whitespace', () => {
    expect(classifyCaller('  DiscordBot   sometoken ')).toMatchObject({ ok: true });
  });

  it('rejects an absent header as a bad request', () => {
    expect(classifyCaller(undefined)).toMatchObject({ ok: false, status: 400 });
  });

  it.each([
    ['Mozilla/5.0'],
    [''],
    ['DiscordBot'],
    ['DiscordBot a b'],
    ['discordbot sometoken'],
    ['Mozilla/5.0 (X11; Linux x86_64)'],
  ])('rejects %j as unauthorized', (header) => {
    expect(classifyCaller(header)).toMatchObject({ ok: false, status: 401 });
  });
});

describe('requireTrustedCaller', () => {
  const app = express();
  app.get('/protected', requireTrustedCaller(), (req: Request, res: Response) => {
    res.json({ caller: req.caller });
  });

  it('passes recognized callers through with their classification', async () => {
    const response = await request(app).get('/protected').set('User-Agent', 'DiscordGuild 1234');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ caller: { tier: 'guild', guildId: '1234' } });
  });

  it('answers 401 for an unrecognized user agent', async () => {
    const response = await request(app).get('/protected').set('User-Agent', 'Mozilla/5.0');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({ error: 'unauthorized', error_description: 'Unrecognized caller' });
  });

  it('answers 400 when the header is missing', async () => {
    const response = await request(app).get('/protected').unset('User-Agent');

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('invalid_request');
  });
});
