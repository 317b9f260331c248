import { ServerDefinition, TestOptions } from '../config/types';
import { HttpMeasurementServer } from './http/handler';

export function createMeasurementServers(
  definitions: ServerDefinition[],
  options: Pick<TestOptions, 'source_address' | 'network' | 'upload_size'>
): HttpMeasurementServer[] {
  return definitions.map(definition => new HttpMeasurementServer(definition, {
    sourceAddress: options.source_address,
    network: options.network,
    uploadSize: options.upload_size
  }));
}
