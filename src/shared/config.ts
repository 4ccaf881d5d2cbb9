import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getRelayDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().default(3892),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.reelrelay/reelrelay.db'),
    })
    .default({}),

  downloads_dir: z.string().default('~/.reelrelay/downloads/'),

  platform: z
    .object({
      profile_url: z.string().default('https://www.tiktok.com/@{handle}/'),
      listing_url: z
        .string()
        .default(
          'https://www.tiktok.com/api/creator/item_list/?aid=1988&type=1&count={count}&cursor=0&secUid={internalId}&verifyFp=verify_',
        ),
      resolver_url: z.string().default('https://www.tikwm.com/api/?url={itemId}&hd=1'),
      hd_url: z.string().default('https://www.tikwm.com/video/media/hdplay/{itemId}.mp4'),
      audio_url: z.string().default('https://www.tikwm.com/video/music/{itemId}.mp3'),
      permalink_url: z.string().default('https://www.tiktok.com/@{handle}/video/{itemId}'),
      blocked_media_hosts: z.array(z.string()).default(['sf16-ies-music-va.tiktokcdn.com']),
      user_agent: z.string().default('Mozilla/5.0'),
      listing_count: z.number().int().positive().default(15),
      timeout_ms: z.number().int().positive().default(15000),
    })
    .default({}),

  schedule: z
    .object({
      poll_cron: z.string().default('*/4 * * * *'),
      batch_size: z.number().int().positive().default(10),
      batch_pause_ms: z.number().int().nonnegative().default(10000),
      freshness_hours: z.number().positive().default(24),
    })
    .default({}),

  delivery: z
    .object({
      max_batch: z.number().int().min(1).max(10).default(10),
      retry: z
        .object({
          attempts: z.number().int().positive().default(3),
          delay_ms: z.number().int().nonnegative().default(1000),
        })
        .default({}),
      album_pause_ms: z.number().int().nonnegative().default(500),
      telegram: z
        .object({
          bot_token: z.string().default(''),
          api_base: z.string().default('https://api.telegram.org'),
          timeout_ms: z.number().int().positive().default(60000),
        })
        .default({}),
    })
    .default({}),

  tokens: z
    .object({
      suffix_length: z.number().int().min(4).max(32).default(6),
      max_entries: z.number().int().positive().default(10_000),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

const RawSection = z.record(z.unknown());

function asRecord(value: unknown): Record<string, unknown> {
  const parsed = RawSection.safeParse(value);
  return parsed.success ? parsed.data : {};
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('reelrelay', {
    searchPlaces: [
      'reelrelay.config.yaml',
      'reelrelay.config.yml',
      '.reelrelayrc.yaml',
      '.reelrelayrc.yml',
    ],
  });

  const envConfigPath = process.env['REELRELAY_CONFIG'];
  const defaultConfigPath = path.join(getRelayDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  const envBotToken = process.env['REELRELAY_BOT_TOKEN'];
  if (envBotToken) {
    const delivery = asRecord(rawConfig['delivery']);
    const telegram = asRecord(delivery['telegram']);
    telegram['bot_token'] = envBotToken;
    delivery['telegram'] = telegram;
    rawConfig['delivery'] = delivery;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
