import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_SETTINGS, buildAppSettings } from './app-settings';

@Module({
  imports: [
    // .env loading only; validation happens once, in the APP_SETTINGS factory
    ConfigModule.forRoot({ isGlobal: true }),
  ],
  providers: [
    {
      provide: APP_SETTINGS,
      // ConfigModule has already merged .env into process.env at this point;
      // a ConfigurationError here fails NestFactory.create.
      useFactory: () => buildAppSettings(process.env),
    },
  ],
  exports: [ConfigModule, APP_SETTINGS],
})
export class CoreModule {}
