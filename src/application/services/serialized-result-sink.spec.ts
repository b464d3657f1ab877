import { BranchEntry } from '../../domain/entities/branch-entry.entity';
import { ResolutionStatus } from '../../domain/enums/resolution-status.enum';
import { PrimaryResultRecord, ResultSinkPort } from '../../domain/ports/result-sink.port';
import { SerializedResultSink } from './serialized-result-sink';

/** Sink lento que registra cuándo empieza y termina cada escritura */
class RecordingSink implements ResultSinkPort {
  readonly events: string[] = [];
  failNext = false;

  async appendPrimary(company: string, _record: PrimaryResultRecord): Promise<void> {
    this.events.push(`start ${company}`);
    await new Promise<void>((resolve) => setImmediate(resolve));
    if (this.failNext) {
      this.failNext = false;
      this.events.push(`fail ${company}`);
      throw new Error(`no se pudo escribir ${company}`);
    }
    this.events.push(`end ${company}`);
  }

  async appendBranches(company: string, _anchor: string, entries: BranchEntry[]): Promise<number> {
    this.events.push(`branches ${company}`);
    return entries.length;
  }
}

const record: PrimaryResultRecord = {
  cnpj: '11.222.333/0001-81',
  sourceUrl: 'https://acme.com.br',
  status: ResolutionStatus.SUCCESS,
  notes: '',
};

describe('SerializedResultSink', () => {
  it('ejecuta las escrituras de a una y en orden', async () => {
    const inner = new RecordingSink();
    const sink = new SerializedResultSink(inner);

    await Promise.all([
      sink.appendPrimary('Acme', record),
      sink.appendPrimary('Beta', record),
      sink.appendBranches('Acme', record.cnpj, [{ label: 'Filial', cnpj: '11.222.333/0002-62' }], 'x'),
    ]);

    expect(inner.events).toEqual(['start Acme', 'end Acme', 'start Beta', 'end Beta', 'branches Acme']);
  });

  it('una escritura fallida rechaza solo su promesa', async () => {
    const inner = new RecordingSink();
    inner.failNext = true;
    const sink = new SerializedResultSink(inner);

    const first = sink.appendPrimary('Acme', record);
    const second = sink.appendPrimary('Beta', record);

    await expect(first).rejects.toThrow('no se pudo escribir Acme');
    await expect(second).resolves.toBeUndefined();
    expect(inner.events).toEqual(['start Acme', 'fail Acme', 'start Beta', 'end Beta']);
  });

  it('devuelve las filas escritas por el sink interno', async () => {
    const sink = new SerializedResultSink(new RecordingSink());

    const written = await sink.appendBranches(
      'Acme',
      record.cnpj,
      [
        { label: 'Filial', cnpj: '11.222.333/0002-62' },
        { label: 'Filial', cnpj: '11.222.333/0003-43' },
      ],
      'x',
    );

    expect(written).toBe(2);
  });
});
