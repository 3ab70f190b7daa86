import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnvironment } from './config/environment';
import { ConsumerModule } from './consumer/consumer.module';
import { SharedModule } from './shared/shared.module';

/**
 * Root module.
 *
 * Built through {@link AppModule.register} because `ConfigModule.forRoot`
 * validates the environment as soon as it is called; deferring the call lets
 * bootstrap report a configuration error itself.
 */
@Module({})
export class AppModule {
  static register(): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          cache: true,
          validate: validateEnvironment,
        }),
        SharedModule,
        ConsumerModule,
      ],
    };
  }
}
