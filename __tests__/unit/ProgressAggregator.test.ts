/**
 * Tests unitarios para src/engines/ProgressAggregator.ts
 */
import ProgressAggregator from '../../src/engines/ProgressAggregator';
import {
  type FileDescriptor,
  PriorityClass,
  type TransferSnapshot,
  TransferStatus,
  type TransferStatusType,
} from '../../src/engines/types';

function descriptor(name: string, expectedSize: number | null): FileDescriptor {
  return {
    name,
    url: `https://models.test/repo/${name}`,
    expectedSize,
    expectedDigest: null,
    priorityClass: PriorityClass.PARAMETER,
  };
}

function snapshot(
  d: FileDescriptor,
  bytesConfirmed: number,
  status: TransferStatusType = TransferStatus.DOWNLOADING
): TransferSnapshot {
  return Object.freeze({
    name: d.name,
    expectedSize: d.expectedSize,
    priorityClass: d.priorityClass,
    localPath: `/tmp/${d.name}`,
    partialPath: `/tmp/${d.name}.partial`,
    bytesConfirmed,
    status,
    attemptCount: 1,
    lastError: null,
    digestVerified: false,
    bytesTransferred: bytesConfirmed,
    networkRequests: 1,
  });
}

describe('ProgressAggregator', () => {
  const a = descriptor('a.bin', 100);
  const b = descriptor('b.bin', 300);
  const unknown = descriptor('c.bin', null);

  it('debe sumar solo los tamaños conocidos en el denominador', () => {
    const aggregator = new ProgressAggregator([a, b, unknown]);
    expect(aggregator.totalKnownBytes).toBe(400);
    expect(aggregator.indeterminateFiles).toBe(1);
  });

  it('debe calcular la fracción global con los bytes confirmados', () => {
    const aggregator = new ProgressAggregator([a, b]);
    aggregator.update(snapshot(a, 100, TransferStatus.VERIFIED));
    const event = aggregator.update(snapshot(b, 100));

    expect(event).toMatchObject({
      fileName: 'b.bin',
      bytesConfirmed: 100,
      totalBytes: 300,
      confirmedBytes: 200,
      totalKnownBytes: 400,
      overallFraction: 0.5,
      indeterminateFiles: 0,
    });
  });

  it('no debe decrecer cuando un archivo vuelve a 0', () => {
    const aggregator = new ProgressAggregator([a, b]);
    aggregator.update(snapshot(b, 200));
    const reset = aggregator.update(snapshot(b, 0, TransferStatus.RETRYING));

    expect(reset?.overallFraction).toBe(0.5);
    expect(reset?.confirmedBytes).toBe(200);

    const resumed = aggregator.update(snapshot(b, 300, TransferStatus.VERIFYING));
    expect(resumed?.overallFraction).toBe(0.75);
  });

  it('debe acotar los bytes de cada archivo a su tamaño esperado', () => {
    const aggregator = new ProgressAggregator([a]);
    const event = aggregator.update(snapshot(a, 500));
    expect(event?.confirmedBytes).toBe(100);
    expect(event?.overallFraction).toBe(1);
  });

  it('debe contar archivos verificados si no hay bytes conocidos', () => {
    const aggregator = new ProgressAggregator([unknown, descriptor('d.bin', null)]);
    expect(aggregator.update(snapshot(unknown, 50))?.overallFraction).toBe(0);
    expect(aggregator.update(snapshot(unknown, 50, TransferStatus.VERIFIED))?.overallFraction).toBe(
      0.5
    );
  });

  it('debe ignorar archivos fuera del manifiesto', () => {
    const aggregator = new ProgressAggregator([a]);
    expect(aggregator.update(snapshot(b, 10))).toBeNull();
  });

  it('debe limitar eventos de bytes pero nunca cambios de estado', () => {
    let now = 1000;
    const aggregator = new ProgressAggregator([b], { throttleMs: 100, now: () => now });

    expect(aggregator.update(snapshot(b, 10))).not.toBeNull();
    now = 1050;
    expect(aggregator.update(snapshot(b, 20))).toBeNull();
    expect(aggregator.overallFraction).toBeCloseTo(20 / 300);

    const statusEvent = aggregator.update(snapshot(b, 30, TransferStatus.VERIFYING));
    expect(statusEvent?.status).toBe(TransferStatus.VERIFYING);

    now = 1200;
    expect(aggregator.update(snapshot(b, 40, TransferStatus.VERIFYING))).not.toBeNull();
  });
});
