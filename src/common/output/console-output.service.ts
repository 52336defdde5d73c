import { Injectable } from '@nestjs/common';
import { CliOutput, ExitCode } from '../interfaces/cli-output.interface';

@Injectable()
export class ConsoleOutputService implements CliOutput {
  write(text: string): void {
    process.stdout.write(`${text}\n`);
  }

  error(text: string): void {
    process.stderr.write(`${text}\n`);
  }

  // Exit code only; the process ends once nest-commander closes the app.
  setExitCode(code: ExitCode): void {
    process.exitCode = code;
  }
}
