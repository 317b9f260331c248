import { ConfigParser } from '../../config/parser';
import { ServerDefinition } from '../../config/types';
import { errorMessage } from '../../core/errors';
import { logger } from '../../utils/logger';

export function formatServerList(servers: ServerDefinition[]): string {
  return servers.map(server => {
    const sponsor = server.sponsorName ? ` [Sponsor: ${server.sponsorName}]` : '';
    return `${server.id}: ${server.name} (${server.server})${sponsor}\n`;
  }).join('');
}

export async function listCommand(configPath: string, options: { env?: string }): Promise<void> {
  try {
    const config = await new ConfigParser().parse(configPath, options.env);
    process.stdout.write(formatServerList(config.servers));
  } catch (error) {
    logger.error(`Failed to load server list: ${errorMessage(error)}`);
    process.exit(1);
  }
}
