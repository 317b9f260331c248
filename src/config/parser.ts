import * as YAML from 'yaml';
import * as fs from 'fs';
import * as path from 'path';
import { SpeedTestConfiguration } from './types';
import { logger } from '../utils/logger';

export class ConfigParser {
  async parse(configPath: string, environment?: string): Promise<SpeedTestConfiguration> {
    logger.debug(`Loading configuration from ${configPath}${environment ? ` (environment: ${environment})` : ''}`);

    if (!fs.existsSync(configPath)) {
      throw new Error(`Configuration file not found: ${configPath}`);
    }

    const configContent = fs.readFileSync(configPath, 'utf8');
    const config = this.normalize(this.parseContent(configContent));

    this.validateRequiredFields(config);

    if (environment) {
      const envConfig = await this.loadEnvironmentConfig(environment, path.dirname(configPath));
      return this.mergeConfigs(config, envConfig);
    }

    return config;
  }

  private parseContent(content: string): unknown {
    const trimmed = content.trim();

    if (trimmed.startsWith('{') || trimmed.startsWith('[')) {
      return JSON.parse(content);
    } else {
      return YAML.parse(content);
    }
  }

  // A bare array is a plain server list
  private normalize(content: unknown): SpeedTestConfiguration {
    if (Array.isArray(content)) {
      return { servers: content };
    }
    if (typeof content !== 'object' || content === null) {
      throw new Error('Configuration must be an object or a server list');
    }
    const fields: Record<string, unknown> = { ...content };
    const servers = fields.servers ?? [];
    if (!Array.isArray(servers)) {
      throw new Error('servers must be a list of server definitions');
    }
    return { ...content, servers };
  }

  private validateRequiredFields(config: SpeedTestConfiguration): void {
    if (!Array.isArray(config.servers) || config.servers.length === 0) {
      throw new Error('At least one server must be defined');
    }
  }

  private async loadEnvironmentConfig(environment: string, baseDir: string): Promise<SpeedTestConfiguration> {
    const envPaths = [
      path.join(baseDir, 'config', 'environments', `${environment}.yml`),
      path.join(baseDir, 'config', 'environments', `${environment}.yaml`),
      path.join(baseDir, 'config', 'environments', `${environment}.json`),
      path.join(baseDir, `${environment}.yml`),
      path.join(baseDir, `${environment}.yaml`),
      path.join(baseDir, `${environment}.json`)
    ];

    for (const envPath of envPaths) {
      if (fs.existsSync(envPath)) {
        const envContent = fs.readFileSync(envPath, 'utf8');
        return this.normalize(this.parseContent(envContent));
      }
    }

    throw new Error(`Environment configuration not found for: ${environment}. Searched paths: ${envPaths.join(', ')}`);
  }

  private mergeConfigs(base: SpeedTestConfiguration, env: SpeedTestConfiguration): SpeedTestConfiguration {
    return {
      ...base,
      servers: env.servers.length > 0 ? env.servers : base.servers,
      telemetry: env.telemetry ?? base.telemetry,
      options: { ...base.options, ...env.options }
    };
  }
}
