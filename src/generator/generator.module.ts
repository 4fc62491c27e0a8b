import { Module } from '@nestjs/common';
import { GeneratorService } from './generator.service';

/**
 * Generator module exposes the generation pipeline to the CLI
 */
@Module({
  providers: [GeneratorService],
  exports: [GeneratorService],
})
export class GeneratorModule {}
