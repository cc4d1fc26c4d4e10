/**
 * Instance configuration
 *
 * Instances and X-Q project mappings come from, in priority order:
 * 1. ~/.vikunja-mcp/config.yaml (or VIKUNJA_MCP_CONFIG)
 * 2. VIKUNJA_INSTANCES (JSON object or array)
 * 3. VIKUNJA_URL + VIKUNJA_TOKEN as the 'default' instance
 *
 * Configuration is re-read on every call so edits to the file apply without a restart.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { HandoffProjectRef, InstanceConfig, InstanceResolver } from '../types/index.js';
import { ConfigError, errorMessage, logger } from '../utils/index.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.vikunja-mcp', 'config.yaml');

const instanceEntrySchema = z.object({
  url: z.string().default(''),
  token: z.string().default(''),
});

const configFileSchema = z
  .object({
    instances: z.record(instanceEntrySchema).nullish(),
    current_instance: z.string().nullish(),
    mcp_context: z.object({ instance: z.string().nullish() }).passthrough().nullish(),
    xq: z.record(z.coerce.number().int().positive()).nullish(),
  })
  .passthrough();

const envInstancesSchema = z.union([
  z.array(instanceEntrySchema.extend({ name: z.string().default('') })),
  z.record(instanceEntrySchema),
]);

const xqEnvSchema = z.record(z.coerce.number().int().positive());

type InstanceEntry = z.infer<typeof instanceEntrySchema>;

interface LoadedConfig {
  instances: Map<string, InstanceEntry>;
  currentInstance: string | null;
  xq: Map<string, number>;
}

export interface ConfigResolverOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export class ConfigInstanceResolver implements InstanceResolver {
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigResolverOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = options.configPath ?? this.env.VIKUNJA_MCP_CONFIG ?? DEFAULT_CONFIG_PATH;
  }

  listInstances(): string[] {
    return [...this.load().instances.keys()];
  }

  defaultInstance(): string | null {
    const config = this.load();

    if (config.currentInstance) {
      return config.currentInstance;
    }
    if (config.instances.has('default')) {
      return 'default';
    }

    const [first] = config.instances.keys();
    return first ?? null;
  }

  getInstance(name?: string): InstanceConfig {
    const config = this.load();
    const instanceName = name || this.defaultInstance();

    if (!instanceName) {
      throw new ConfigError(
        'No instance configured. Set VIKUNJA_URL/VIKUNJA_TOKEN or configure instances.'
      );
    }

    const entry = config.instances.get(instanceName);
    if (!entry) {
      const available = [...config.instances.keys()].join(', ') || 'none';
      throw new ConfigError(`Instance '${instanceName}' not found. Available: ${available}`);
    }

    const token = this.resolveToken(instanceName, entry.token);
    if (!entry.url || !token) {
      throw new ConfigError(`Instance '${instanceName}' missing url or token`);
    }

    return { name: instanceName, baseUrl: stripTrailingSlash(entry.url), token };
  }

  resolveHandoffProject(name?: string): HandoffProjectRef {
    const config = this.load();
    const instanceName = name || this.defaultInstance();

    if (!instanceName) {
      throw new ConfigError('No instance configured for X-Q');
    }

    const projectId = config.xq.get(instanceName);
    if (projectId === undefined) {
      throw new ConfigError(
        `X-Q not configured for '${instanceName}'. Add it to the 'xq' section of ${this.configPath}`
      );
    }

    return { ...this.getInstance(instanceName), projectId };
  }

  private resolveToken(instanceName: string, token: string): string {
    const reference = /^\$\{(\w+)\}$/.exec(token);
    if (!reference) {
      return token;
    }

    const value = this.env[reference[1]];
    if (!value) {
      throw new ConfigError(
        `Environment variable ${reference[1]} not set for instance '${instanceName}'`
      );
    }
    return value;
  }

  private load(): LoadedConfig {
    const file = this.readConfigFile();
    const instances = new Map<string, InstanceEntry>(Object.entries(file.instances ?? {}));
    const xq = new Map<string, number>(Object.entries(file.xq ?? {}));

    for (const [name, entry] of this.readEnvInstances()) {
      if (name && !instances.has(name)) {
        instances.set(name, entry);
      }
    }

    const envUrl = this.env.VIKUNJA_URL;
    const envToken = this.env.VIKUNJA_TOKEN;
    if (envUrl && envToken && !instances.has('default')) {
      instances.set('default', { url: envUrl, token: envToken });
    }

    for (const [name, projectId] of this.readEnvXq()) {
      if (!xq.has(name)) {
        xq.set(name, projectId);
      }
    }

    return {
      instances,
      currentInstance: file.mcp_context?.instance || file.current_instance || null,
      xq,
    };
  }

  private readConfigFile(): z.infer<typeof configFileSchema> {
    if (!existsSync(this.configPath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(readFileSync(this.configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Malformed config file ${this.configPath}: ${errorMessage(error)}`);
    }

    const result = configFileSchema.safeParse(parsed ?? {});
    if (!result.success) {
      throw new ConfigError(
        `Invalid config file ${this.configPath}: ${result.error.issues
          .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
          .join('; ')}`
      );
    }
    return result.data;
  }

  private readEnvInstances(): Array<[string, InstanceEntry]> {
    const raw = this.env.VIKUNJA_INSTANCES;
    if (!raw) {
      return [];
    }

    const result = parseJsonEnv('VIKUNJA_INSTANCES', raw, envInstancesSchema);
    if (!result) {
      return [];
    }
    if (Array.isArray(result)) {
      return result.map(({ name, url, token }): [string, InstanceEntry] => [name, { url, token }]);
    }
    return Object.entries(result);
  }

  private readEnvXq(): Array<[string, number]> {
    const raw = this.env.VIKUNJA_XQ;
    if (!raw) {
      return [];
    }
    return Object.entries(parseJsonEnv('VIKUNJA_XQ', raw, xqEnvSchema) ?? {});
  }
}

function parseJsonEnv<S extends z.ZodTypeAny>(
  name: string,
  raw: string,
  schema: S
): z.infer<S> | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    logger.warn(`Ignoring ${name}: not valid JSON`, { error: errorMessage(error) });
    return null;
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    logger.warn(`Ignoring ${name}: unexpected shape`, { issues: result.error.issues.length });
    return null;
  }
  return result.data;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
