import type { UpsertProgress } from '../../../services/graph/GraphUpsertEngine.js';
import type { BuildProgress } from '../types.js';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const PHASE_LABELS: Record<BuildProgress['phase'], string> = {
  loading: 'Loading records',
  connecting: 'Connecting to Neo4j',
  building: 'Building graph and similarity links',
};

/** `12/40 incidents written, 1 failed` */
export const formatUpsertTick = ({ done, failed, total }: UpsertProgress): string =>
  `${done - failed}/${total} incidents written${failed > 0 ? `, ${failed} failed` : ''}`;

export class ProgressReporter {
  private enabled: boolean;
  private visibleLength = 0;
  private current: BuildProgress | null = null;

  constructor(enabled: boolean = true) {
    this.enabled = enabled && process.stdout.isTTY === true;
  }

  update(progress: BuildProgress): void {
    this.current = progress;
    if (!this.enabled) return;

    const step = `[${progress.current}/${progress.total}]`;
    const label = PHASE_LABELS[progress.phase];
    const detail = progress.detail ? ` - ${progress.detail}` : '';
    this.redraw(`${fmt('cyan', step)} ${label}${fmt('dim', detail)}`, `${step} ${label}${detail}`.length);
  }

  /** Redraws the building line with the running write count */
  recordWritten(progress: UpsertProgress): void {
    if (!this.current || this.current.phase !== 'building') return;
    this.update({ ...this.current, detail: formatUpsertTick(progress) });
  }

  complete(message: string): void {
    this.print(`${fmt('green', '✓')} ${message}`);
  }

  warn(message: string): void {
    this.print(`${fmt('yellow', '⚠')} ${message}`);
  }

  error(message: string): void {
    this.clearLine();
    console.log(`${fmt('red', '✗')} ${message}`);
  }

  private print(line: string): void {
    if (!this.enabled) return;
    this.clearLine();
    console.log(line);
  }

  private redraw(line: string, visibleLength: number): void {
    this.clearLine();
    process.stdout.write(line);
    this.visibleLength = visibleLength;
  }

  private clearLine(): void {
    if (this.visibleLength > 0) {
      process.stdout.write('\r' + ' '.repeat(this.visibleLength) + '\r');
      this.visibleLength = 0;
    }
  }
}
