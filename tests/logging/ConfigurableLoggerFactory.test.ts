/**
 * ConfigurableLoggerFactory unit tests
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { Format } from 'logform';
import { setGlobalLoggerFactory } from 'global-logger-factory';
import { ConfigurableLoggerFactory, initLogging } from '../../src/logging/ConfigurableLoggerFactory';
import { logContext } from '../../src/logging/LogContext';

const MESSAGE = Symbol.for('message');

class InspectableLoggerFactory extends ConfigurableLoggerFactory {
  public format(label: string): Format {
    return this.getFormat(label);
  }
}

function render(factory: InspectableLoggerFactory, label: string): unknown {
  const info = factory.format(label).transform({ level: 'info', message: 'hello' });
  return typeof info === 'boolean' ? info : info[MESSAGE];
}

describe('ConfigurableLoggerFactory', () => {
  afterEach(() => {
    setGlobalLoggerFactory(new ConfigurableLoggerFactory('error'));
  });

  it('should print timestamp, label, level and message', () => {
    const factory = new InspectableLoggerFactory('info');

    expect(render(factory, 'MarkdownChunkPlanner')).toMatch(/^\S+ \[MarkdownChunkPlanner\] info: hello$/);
  });

  it('should print the chunk id from the log context', () => {
    const factory = new InspectableLoggerFactory('info');

    const line = logContext.run({ chunkId: 'chunk-0007' }, () => render(factory, 'Runner'));

    expect(line).toMatch(/^\S+ \[Chunk:chunk-0007\] \[Runner\] info: hello$/);
  });

  it('should shorten path labels when showing locations', () => {
    const factory = new InspectableLoggerFactory('info', { showLocation: true });

    expect(render(factory, 'pipeline/ChunkTransformRunner')).toMatch(/^\S+ \[ChunkTransformRunner\] info: hello$/);
  });

  it('should install itself as the global factory', () => {
    const factory = initLogging({ logLevel: 'error' });

    expect(factory).toBeInstanceOf(ConfigurableLoggerFactory);
    expect(factory.createLogger('Test')).toBeDefined();
  });
});
