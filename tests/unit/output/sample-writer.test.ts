import { describe, it, expect } from 'vitest';
import { RowFormatter, UNRESPONSIVE_MARKER } from '@/output/row-formatter.js';
import { SampleWriter, type LineSink } from '@/output/sample-writer.js';
import { SamplingOrchestrator } from '@/core/sampling-orchestrator.js';
import type { Sample } from '@/types/metrics.js';
import { ScriptedDatabase, ScriptedHost, keyspace, makeConfig, silentLogger } from '../../helpers/sampler-fakes.js';

class BufferSink implements LineSink {
  public chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }
}

const config = makeConfig();
const formatter = new RowFormatter(config.columns);
const HEADER = `${formatter.header()}\n`;

function sample(sequence: number, extra: Partial<Sample> = {}): Sample {
  return {
    sequence,
    reads: sequence,
    writes: 0,
    readLatencyMs: 0,
    writeLatencyMs: 0,
    cpu: { user: 0, nice: 0, system: 0, iowait: 0, steal: 0, idle: 100 },
    disk: { readsPerSec: 0, writesPerSec: 0, readKBps: 0, writeKBps: 0 },
    network: { rxKBps: 0, txKBps: 0 },
    events: [],
    ...extra,
  };
}

function row(sequence: number): string {
  return `${formatter.row(sample(sequence))}\n`;
}

describe('SampleWriter', () => {
  it('should repeat the header every N rows', () => {
    const out = new BufferSink();
    const writer = new SampleWriter({ formatter, out, headers: true, headerEvery: 2 });

    for (const sequence of [1, 2, 3]) {
      writer.writeSample(sample(sequence));
    }

    expect(out.chunks).toEqual([HEADER, row(1), row(2), HEADER, row(3)]);
    expect(writer.getRowCount()).toBe(3);
  });

  it('should never print a header when headers are off', () => {
    const out = new BufferSink();
    const writer = new SampleWriter({ formatter, out, headers: false, headerEvery: 1 });

    writer.writeSample(sample(1));
    writer.writeSample(sample(2));

    expect(out.chunks).toEqual([row(1), row(2)]);
  });

  it('should count the unresponsive sentinel as a row', () => {
    const out = new BufferSink();
    const writer = new SampleWriter({ formatter, out, headers: true, headerEvery: 2 });

    writer.writeSample(sample(1));
    writer.writeUnresponsive({ sequence: 2, at: 0 });
    writer.writeSample(sample(3));

    expect(out.chunks).toEqual([HEADER, row(1), `${UNRESPONSIVE_MARKER}\n`, HEADER, row(3)]);
  });

  it('should write events inline after their row', () => {
    const out = new BufferSink();
    const writer = new SampleWriter({ formatter, out, headers: false, headerEvery: 10 });

    writer.writeSample(
      sample(1, { events: [{ timestamp: '10:15:00,120', tag: 'FlushCompleted', fields: [] }] })
    );

    expect(out.chunks).toEqual([row(1), 'event 10:15:00,120 FlushCompleted\n']);
  });

  it('should route events to a separate sink', () => {
    const out = new BufferSink();
    const events = new BufferSink();
    const writer = new SampleWriter({ formatter, out, events, headers: false, headerEvery: 10 });

    writer.writeSample(
      sample(1, { events: [{ timestamp: '10:15:00,120', tag: 'RepairStarted', fields: ['#42'] }] })
    );

    expect(out.chunks).toEqual([row(1)]);
    expect(events.chunks).toEqual(['event 10:15:00,120 RepairStarted #42\n']);
  });

  it('should write rows for orchestrator output once attached', () => {
    const out = new BufferSink();
    const writer = new SampleWriter({ formatter, out, headers: false, headerEvery: 10 });
    const orchestrator = new SamplingOrchestrator({
      config,
      database: new ScriptedDatabase([keyspace(0, 0)]),
      host: new ScriptedHost(),
      logger: silentLogger,
    });

    writer.attach(orchestrator);
    orchestrator.emit('sample', sample(7));
    orchestrator.emit('unresponsive', { sequence: 8, at: 0 });

    expect(out.chunks).toEqual([row(7), `${UNRESPONSIVE_MARKER}\n`]);
  });
});
