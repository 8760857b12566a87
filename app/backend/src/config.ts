import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

// Remote sources come first: zod strips unknown keys, so `{ file }` would swallow `url`.
const assetSourceSchema = z.union([
  z.object({ url: z.string().url(), file: z.string().min(1) }),
  z.object({ file: z.string().min(1) }),
]);

export const settingsSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(4000),
    bodyLimit: z.string().default('30mb'),
  }),
  search: z.object({
    endpoint: z.string().url().default('https://api.pexels.com/v1/search'),
    apiKey: z.string().default(''),
    perPage: z.number().int().min(1).max(80).default(15),
    timeoutMs: z.number().int().positive().default(10_000),
    retries: z.number().int().min(0).max(1).default(1),
  }),
  assets: z.object({
    cacheDir: z.string(),
    logo: assetSourceSchema,
    fonts: z.object({
      family: z.string().default('PosterSans'),
      regular: assetSourceSchema,
      semiBold: assetSourceSchema,
      bold: assetSourceSchema,
    }),
    icons: z.record(assetSourceSchema).default({}),
  }),
  footer: z.object({
    ctaText: z.string(),
    linkText: z.string(),
    qrUrl: z.string().url(),
  }),
  webhook: z.object({
    url: z.string().default(''),
    timeoutMs: z.number().int().positive().default(15_000),
  }),
  batch: z.object({
    variants: z.number().int().min(1).max(5).default(5),
    maxParallel: z.number().int().min(1).default(5),
  }),
});

export type Settings = z.infer<typeof settingsSchema>;
export type AssetSource = z.infer<typeof assetSourceSchema>;

export const applyEnvironment = (settings: Settings, env: NodeJS.ProcessEnv): Settings => ({
  ...settings,
  server: { ...settings.server, port: env.PORT ? Number(env.PORT) : settings.server.port },
  search: { ...settings.search, apiKey: env.PEXELS_API_KEY ?? settings.search.apiKey },
  webhook: { ...settings.webhook, url: env.WEBHOOK_URL ?? settings.webhook.url },
});

export class SettingsService {
  private static instance: SettingsService;
  private config?: Settings;

  private constructor() {}

  static getInstance() {
    if (!SettingsService.instance) {
      SettingsService.instance = new SettingsService();
    }
    return SettingsService.instance;
  }

  async load(): Promise<Settings> {
    if (this.config) {
      return this.config;
    }
    const settingsPath =
      process.env.POSTER_SETTINGS ?? path.resolve(process.cwd(), 'config/settings.json');
    const file = await readFile(settingsPath, 'utf-8');
    const parsed = settingsSchema.parse(JSON.parse(file));
    const settings = applyEnvironment(parsed, process.env);
    // Relative asset paths are resolved against the settings file's directory.
    const baseDir = path.dirname(settingsPath);
    this.config = {
      ...settings,
      assets: { ...settings.assets, cacheDir: path.resolve(baseDir, settings.assets.cacheDir) },
    };
    return this.config;
  }
}
