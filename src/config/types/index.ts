export * from './server-config';
export * from './telemetry-config';
export * from './test-options';
export * from './speedtest-config';
