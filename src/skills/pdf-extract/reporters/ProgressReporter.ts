import type { ExtractionProgress } from '../../../services/extraction/ExtractionPipeline.js';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const PHASE_LABELS: Record<ExtractionProgress['phase'], string> = {
  rendering: 'Rendering pages',
  transcribing: 'Transcribing segments',
  reconciling: 'Removing overlaps',
};

export class ProgressReporter {
  private enabled: boolean;
  private lastLineLength = 0;

  constructor(
    enabled = true,
    private out: NodeJS.WriteStream = process.stderr
  ) {
    this.enabled = enabled && Boolean(out.isTTY);
  }

  update(progress: ExtractionProgress): void {
    if (!this.enabled) return;

    this.clearLine();
    const counter = fmt('cyan', `[${progress.current}/${progress.total}]`);
    const label = PHASE_LABELS[progress.phase];
    const detail = progress.label ? fmt('dim', ` - ${progress.label}`) : '';
    const line = `${counter} ${label}${detail}`;
    this.out.write(line);
    this.lastLineLength = line.length;
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(`${fmt('green', '✓')} ${message}\n`);
  }

  error(message: string): void {
    this.clearLine();
    this.out.write(`${fmt('red', '✗')} ${message}\n`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      this.out.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
