import { RecordingMetrics, RecordingQueue, captureLogger } from '../testing/fakes';
import { QueueError, ValidationError } from '../utils/errors';
import { IngestionService } from './ingestion';

const envelope = {
  alarm: {
    name: 'Front door motion',
    triggers: [{ key: 'motion', device: 'AA:BB', eventId: 'evt1' }],
  },
  timestamp: 1700000000000,
};

function createService(queue = new RecordingQueue()) {
  const metrics = new RecordingMetrics();
  const { logger } = captureLogger();
  const service = new IngestionService(queue, metrics, logger, {
    processingDelaySeconds: 120,
    now: () => new Date('2023-11-14T22:13:20Z'),
  });
  return { service, queue, metrics };
}

describe('IngestionService', () => {
  it('should queue a valid alarm with the processing delay and acknowledge it', async () => {
    const { service, queue, metrics } = createService();

    const ack = await service.ingest(envelope);

    expect(ack).toEqual({
      msg: 'Alarm event has been queued for processing',
      eventId: 'evt1',
      device: 'AA:BB',
      processingDelay: 120,
      messageId: 'msg-1',
      estimatedProcessingTime: '2023-11-14 22:15:20 UTC',
    });
    expect(queue.sent).toHaveLength(1);
    expect(queue.sent[0].delaySeconds).toBe(120);
    expect(queue.sent[0].alarm.triggers[0].eventId).toBe('evt1');
    expect(queue.sent[0].alarm.timestamp).toBe(1700000000000);
    expect(metrics.named('AlarmsQueued')).toHaveLength(1);
  });

  it('should reject an invalid alarm without queueing it', async () => {
    const { service, queue, metrics } = createService();

    await expect(service.ingest({ alarm: { triggers: [] }, timestamp: 1 })).rejects.toThrow(ValidationError);
    expect(queue.sent).toHaveLength(0);
    expect(metrics.named('AlarmsRejected')).toEqual([
      { name: 'AlarmsRejected', value: 1, dimensions: { Reason: 'MissingTriggers' } },
    ]);
  });

  it('should surface queue failures', async () => {
    const queue = new RecordingQueue();
    queue.enqueue = async () => {
      throw new QueueError('Failed to queue alarm for processing');
    };
    const { service, metrics } = createService(queue);

    await expect(service.ingest(envelope)).rejects.toThrow(QueueError);
    expect(metrics.named('AlarmsQueued')).toHaveLength(0);
  });
});
