import { KafkaAdapter } from '../../adapters/kafka/kafka.adapter';
import { KafkaTransport } from '../kafka.transport';
import { testConfig } from '../../test-utils/fakes';

jest.mock('kafkajs');

describe('KafkaTransport', () => {
  let adapter: KafkaAdapter;
  let publish: jest.SpyInstance;
  let transport: KafkaTransport;

  beforeEach(() => {
    adapter = new KafkaAdapter({ brokers: ['localhost:9092'] });
    publish = jest.spyOn(adapter, 'publish');
    transport = new KafkaTransport(adapter, testConfig({ SMS_OUTBOUND_TOPIC: 'sms.out.test' }));
  });

  it('publishes one record keyed by the recipient and reports its position', async () => {
    publish.mockResolvedValue([{ topicName: 'sms.out.test', partition: 2, errorCode: 0, baseOffset: '41' }]);

    const result = await transport.send('+15550000001', 'Hello');

    expect(result).toEqual({ ok: true, providerId: 'sms.out.test/2/41' });
    expect(publish).toHaveBeenCalledWith(
      'sms.out.test',
      { to: '+15550000001', body: 'Hello', requestedAt: expect.any(String) },
      '+15550000001',
    );
  });

  it('reports a broker error code as a failed send', async () => {
    publish.mockResolvedValue([{ topicName: 'sms.out.test', partition: 0, errorCode: 6 }]);

    await expect(transport.send('+15550000001', 'Hello')).resolves.toEqual({
      ok: false,
      error: 'broker error code 6',
    });
  });

  it('reports missing metadata as a failed send', async () => {
    publish.mockResolvedValue([]);

    await expect(transport.send('+15550000001', 'Hello')).resolves.toEqual({
      ok: false,
      error: 'broker returned no record metadata',
    });
  });

  it('turns publish errors into a failed result', async () => {
    publish.mockRejectedValue(new Error('Kafka is disabled'));

    await expect(transport.send('+15550000001', 'Hello')).resolves.toEqual({
      ok: false,
      error: 'Kafka is disabled',
    });
  });
});
