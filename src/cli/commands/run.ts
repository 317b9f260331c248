import { loadRunConfig, RunOptions } from './load-config';
import { ConfigValidator } from '../../config/validator';
import { createMeasurementServers } from '../../measurement/factory';
import { cliSpeedTest } from '../../core/test-runner';
import { errorMessage } from '../../core/errors';
import { logger, LogLevel } from '../../utils/logger';

export async function runCommand(configPath: string, options: RunOptions): Promise<void> {
  try {
    const { servers, options: testOptions } = await loadRunConfig(configPath, options);

    if (options.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    } else if (testOptions.simple || testOptions.csv || testOptions.json) {
      logger.setLevel(LogLevel.WARN);
    } else {
      logger.setLevel(LogLevel.INFO);
    }

    const validator = new ConfigValidator();
    const validation = validator.validate(servers, testOptions);

    if (!validation.valid) {
      logger.error('Configuration validation failed:');
      validation.errors.forEach(error => logger.error(`  - ${error}`));
      process.exit(1);
    }

    validation.warnings.forEach(warning => logger.warn(warning));

    await cliSpeedTest(createMeasurementServers(servers, testOptions), testOptions, { logger });
  } catch (error) {
    logger.error(`Speed test failed: ${errorMessage(error)}`);
    if (options.verbose && error instanceof Error) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}
