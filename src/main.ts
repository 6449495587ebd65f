#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { renderBanner } from './banner/banner.util';
import { formatFatalError, SettingsError } from './common/errors/pipeline.errors';
import { RunFileLogger } from './common/logging/run-file.logger';
import { maskSensitive } from './common/utils/mask.util';
import { DEFAULT_SETTINGS_PATH, loadSettings } from './config/settings.loader';
import { Settings } from './config/settings.schema';
import { LanguageTableService } from './i18n/language-table.service';
import { QueuePipelineService } from './pipeline/queue-pipeline.service';

const EXIT_SETTINGS_ERROR = 1;
const EXIT_FAILED_RUN = 1;
const EXIT_CANCELLED = 130;

interface CliOptions {
  configPath: string;
}

// --config=<path> 만 지원
function parseCliOptions(argv: string[]): CliOptions {
  const options: CliOptions = { configPath: DEFAULT_SETTINGS_PATH };
  for (const arg of argv) {
    if (arg.startsWith('--config=')) {
      const value = arg.slice('--config='.length).trim();
      if (value) options.configPath = value;
    }
  }
  return options;
}

async function bootstrap(): Promise<void> {
  const cli = parseCliOptions(process.argv.slice(2));

  let settings: Settings;
  try {
    settings = await loadSettings(cli.configPath);
  } catch (error) {
    if (error instanceof SettingsError) {
      console.error(error.message);
      process.exitCode = EXIT_SETTINGS_ERROR;
      return;
    }
    throw error;
  }

  const logger = new RunFileLogger({
    enableFile: settings.operation.enable_logging,
    filePath: settings.files.log_file,
    verbose: settings.operation.verbose_logging,
  });
  logger.openSession();

  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot(settings),
    { logger },
  );
  const strings = app.get(LanguageTableService);

  process.once('SIGINT', () => {
    console.log(`\n${strings.get('cancelled')}`);
    process.exit(EXIT_CANCELLED);
  });

  logger.debug(`⚙️ 설정: ${JSON.stringify(maskSensitive(settings))}`);
  console.log(
    renderBanner({
      title: strings.get('header_title'),
      platformsTitle: strings.get('platforms_title'),
      platforms: settings.platforms,
      filterDenuvo: settings.operation.filter_denuvo,
    }),
  );

  const result = await app.get(QueuePipelineService).run();
  await app.close();

  if (result.outcome === 'failed') {
    process.exitCode = EXIT_FAILED_RUN;
  }
}

void bootstrap().catch((error: unknown) => {
  console.error(formatFatalError(error));
  process.exitCode = 1;
});
