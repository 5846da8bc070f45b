import { SingleBar } from 'cli-progress';

export type ProgressListener = (done: number, total: number) => void;

/**
 * Terminal progress bar for embedding chunks. The bar renders to stderr so it
 * never mixes with the answer on stdout.
 */
export class IndexingProgress {
  private bar: SingleBar;
  private started = false;

  constructor(private readonly title: string = 'Embedding') {
    this.bar = new SingleBar({
      format: '{title} [{bar}] {percentage}% | {value}/{total} chunks',
      hideCursor: true,
      clearOnComplete: false,
      stopOnComplete: true,
      stream: process.stderr,
    });
  }

  /** Listener to pass to buildIndex */
  readonly listener: ProgressListener = (done, total) => {
    if (!this.started) {
      this.bar.start(total, 0, { title: this.title });
      this.started = true;
    }
    this.bar.update(done);
  };

  stop(): void {
    if (this.started) {
      this.bar.stop();
      this.started = false;
    }
  }
}
