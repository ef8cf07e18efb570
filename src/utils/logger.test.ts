import { Logger, describeError } from './logger';

describe('Logger', () => {
  it('should write one JSON line per entry with its context', () => {
    const lines: string[] = [];
    const logger = new Logger({ functionName: 'alarm-video-receiver' }, (line) => lines.push(line));

    logger.info('Queued alarm', { eventId: 'evt1' });

    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'INFO',
      message: 'Queued alarm',
      functionName: 'alarm-video-receiver',
      data: { eventId: 'evt1' },
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should add context in child loggers without changing the parent', () => {
    const lines: string[] = [];
    const parent = new Logger({ requestId: 'req-1' }, (line) => lines.push(line));
    const child = parent.child({ eventId: 'evt1' });

    child.warn('Thumbnail is empty, skipping');
    parent.error('Request failed');

    expect(JSON.parse(lines[0])).toMatchObject({ level: 'WARN', requestId: 'req-1', eventId: 'evt1' });
    expect(JSON.parse(lines[1]).eventId).toBeUndefined();
    expect(JSON.parse(lines[1])).not.toHaveProperty('data');
  });

  it('should describe thrown values of any type', () => {
    expect(describeError('plain')).toEqual({ error: 'plain', stack: undefined });
    expect(describeError(new Error('boom')).error).toBe('boom');
  });
});
