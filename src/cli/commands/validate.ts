import { loadRunConfig } from './load-config';
import { ConfigValidator } from '../../config/validator';
import { errorMessage } from '../../core/errors';
import { logger, LogLevel } from '../../utils/logger';

export async function validateCommand(
  configPath: string,
  options: { env?: string }
): Promise<void> {
  logger.setLevel(LogLevel.INFO);

  try {
    logger.info(`🔍 Validating configuration: ${configPath}`);

    const { servers, options: testOptions } = await loadRunConfig(configPath, { env: options.env });

    const validator = new ConfigValidator();
    const result = validator.validate(servers, testOptions);

    if (result.valid) {
      logger.success(`✅ Configuration is valid (${servers.length} server${servers.length === 1 ? '' : 's'})`);

      if (result.warnings.length > 0) {
        logger.warn('⚠️  Warnings:');
        result.warnings.forEach(warning => logger.warn(`  - ${warning}`));
      }
    } else {
      logger.error('❌ Configuration validation failed:');
      result.errors.forEach(error => logger.error(`  - ${error}`));

      if (result.warnings.length > 0) {
        logger.warn('⚠️  Warnings:');
        result.warnings.forEach(warning => logger.warn(`  - ${warning}`));
      }

      process.exit(1);
    }
  } catch (error) {
    logger.error(`❌ Validation failed: ${errorMessage(error)}`);
    process.exit(1);
  }
}
