import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { Update } from 'telegraf/typings/core/types/typegram';
import { loadConfig } from '../FilmPicker/config';
import { createApp } from '../FilmPicker/app';

// Fails the cold start when credentials are missing
const config = loadConfig();
const { bot, storage } = createApp(config);

// Tables are created once per instance, on the first update
let ready: Promise<void> | undefined;

function isUpdate(value: unknown): value is Update {
  return typeof value === 'object' && value !== null && 'update_id' in value && typeof value.update_id === 'number';
}

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (req.method !== 'POST') {
    return res.status(200).send('OK');
  }

  if (config.webhookSecret && req.query.secret !== config.webhookSecret) {
    return res.status(403).send('Forbidden');
  }

  try {
    const update: unknown = typeof req.body === 'string' ? JSON.parse(req.body) : req.body;
    if (!isUpdate(update)) {
      return res.status(400).send('Bad Request');
    }
    ready ??= storage.init().catch((err: unknown) => {
      ready = undefined;
      throw err;
    });
    await ready;
    await bot.handleUpdate(update);
    res.status(200).send('OK');
  } catch (err) {
    console.error('[webhook] failed to handle update', err);
    res.status(500).end();
  }
}
