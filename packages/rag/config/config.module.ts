import { Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { ConfigurationService } from './configuration.js';

@Module({
  imports: [NestConfigModule.forRoot({ cache: true })],
  providers: [ConfigurationService],
  exports: [ConfigurationService],
})
export class ConfigModule {}
