import { BranchEntry } from '../../domain/entities/branch-entry.entity';
import { PrimaryResultRecord, ResultSinkPort } from '../../domain/ports/result-sink.port';

/**
 * Envuelve un sink para que las escrituras de varios workers
 * se ejecuten de a una, en el orden en que se pidieron.
 */
export class SerializedResultSink implements ResultSinkPort {
  private tail: Promise<unknown> = Promise.resolve();

  constructor(private readonly inner: ResultSinkPort) {}

  appendPrimary(company: string, record: PrimaryResultRecord): Promise<void> {
    return this.enqueue(() => this.inner.appendPrimary(company, record));
  }

  appendBranches(
    company: string,
    anchorCnpj: string,
    entries: BranchEntry[],
    source: string,
  ): Promise<number> {
    return this.enqueue(() => this.inner.appendBranches(company, anchorCnpj, entries, source));
  }

  private enqueue<T>(write: () => Promise<T>): Promise<T> {
    const run = this.tail.then(write);
    // el error llega al llamador vía `run`; la cola sigue con la próxima escritura
    this.tail = run.catch(() => undefined);
    return run;
  }
}
