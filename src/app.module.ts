import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { GatewayModule } from './modules';
import { createGatewayConfig, EnvironmentVariables, validateEnvironment } from './config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnvironment,
    }),
    GatewayModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
        createGatewayConfig({
          HOST: configService.get('HOST', { infer: true }),
          PORT: configService.get('PORT', { infer: true }),
          DEBUG: configService.get('DEBUG', { infer: true }),
          GITHUB_WEBHOOK_SECRET: configService.get('GITHUB_WEBHOOK_SECRET', { infer: true }),
          VERIFY_SIGNATURES: configService.get('VERIFY_SIGNATURES', { infer: true }),
          MAX_BODY_BYTES: configService.get('MAX_BODY_BYTES', { infer: true }),
          ENABLE_SWAGGER: configService.get('ENABLE_SWAGGER', { infer: true }),
        }),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
