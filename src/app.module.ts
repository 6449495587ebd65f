import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Settings } from './config/settings.schema';
import { I18nModule } from './i18n/i18n.module';
import { PipelineModule } from './pipeline/pipeline.module';

@Module({})
export class AppModule {
  /**
   * 검증된 settings.json 을 설정 트리로 등록
   */
  static forRoot(settings: Settings): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ ...settings })],
        }),
        I18nModule,
        PipelineModule,
      ],
    };
  }
}
