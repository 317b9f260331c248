import { ServerDefinition } from './types';

/**
 * Keeps the servers named in `include` (in that order) when given, then
 * drops those in `exclude`.
 */
export function selectServers(
  servers: ServerDefinition[],
  include: number[] = [],
  exclude: number[] = []
): ServerDefinition[] {
  let selected = servers;

  if (include.length > 0) {
    selected = [];
    for (const id of include) {
      const server = servers.find(s => s.id === id);
      if (!server) {
        throw new Error(`Server with id ${id} not found in server list`);
      }
      selected.push(server);
    }
  }

  return selected.filter(server => !exclude.includes(server.id));
}
