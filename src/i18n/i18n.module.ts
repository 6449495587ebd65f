import { Global, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { FilesSettings, OperationSettings } from '../config/settings.schema';
import { LanguageTableService } from './language-table.service';

@Global()
@Module({
  providers: [
    {
      provide: LanguageTableService,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const files = configService.getOrThrow<FilesSettings>('files');
        const operation = configService.getOrThrow<OperationSettings>('operation');
        return LanguageTableService.load(
          files.language_file,
          operation.display_language,
        );
      },
    },
  ],
  exports: [LanguageTableService],
})
export class I18nModule {}
