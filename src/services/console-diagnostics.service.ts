import { inject, injectable } from 'tsyringe';
import { AppConfig } from '../config/app.config';
import { IDiagnostics } from './diagnostics.interface';

@injectable()
export class ConsoleDiagnostics implements IDiagnostics {
  constructor(@inject('AppConfig') private readonly config: AppConfig) {}

  info(message: string): void {
    if (!this.config.quiet) {
      console.log(`[CSV Analyzer] ${message}`);
    }
  }

  warn(message: string): void {
    // Failures stay visible in quiet mode
    console.warn(`[CSV Analyzer] ${message}`);
  }
}
