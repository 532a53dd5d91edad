import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  discordConfig,
  ipcConfig,
  orchestratorConfig,
  maintenanceConfig,
  loggingConfig,
} from './config/configuration';
import { validationSchema } from './config/validation.schema';

@Global()
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        discordConfig,
        ipcConfig,
        orchestratorConfig,
        maintenanceConfig,
        loggingConfig,
      ],
      validationSchema,
      validationOptions: {
        abortEarly: false,
      },
    }),
  ],
  exports: [ConfigModule],
})
export class SharedModule {}
