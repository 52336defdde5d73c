import { Global, Module } from '@nestjs/common';
import { CLI_OUTPUT } from '../interfaces/cli-output.interface';
import { ConsoleOutputService } from './console-output.service';

@Global()
@Module({
  providers: [{ provide: CLI_OUTPUT, useClass: ConsoleOutputService }],
  exports: [CLI_OUTPUT],
})
export class OutputModule {}
