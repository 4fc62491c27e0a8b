import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import generatorConfig from './config/generator.config';
import schemaConfig from './config/schema.config';
import { GeneratorModule } from './generator/generator.module';

/**
 * Root module of the querysmith CLI
 * Configuration is loaded first so an invalid schema fails before generation starts
 */
@Module({
  imports: [
    // Configuration - loaded first, available globally
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      ignoreEnvFile: true,
      load: [generatorConfig, schemaConfig],
    }),

    GeneratorModule,
  ],
})
export class AppModule {}
