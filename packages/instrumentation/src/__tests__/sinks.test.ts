import {mkdtempSync, readFileSync, readdirSync, rmSync} from 'node:fs';
import {tmpdir} from 'node:os';
import {join} from 'node:path';
import {Writable} from 'node:stream';

import {createStructuredLogger} from '@service-middleware/logging';
import {createDatagramTransport, type DatagramSocket} from '@service-middleware/metrics';
import {afterEach, describe, expect, it, vi} from 'vitest';

import {
  createHealthdFileWriter,
  createHealthdLogSink,
  formatHealthdLine,
  healthdLogFileName
} from '../sinks/healthd';
import {
  buildRequestMetricLines,
  createStatsdLogSink,
  durationMilliseconds,
  sanitizeTagValue
} from '../sinks/statsd';
import {createStructuredLogSink, durationSeconds} from '../sinks/structured';
import {createEvent, createRequest} from './fixtures';

const createLoggerSpy = () => ({
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn()
});

const createRecordingSocket = () => {
  const messages: string[] = [];
  const socket: DatagramSocket = {
    send: (message, _port, _address, callback) => {
      messages.push(message);
      callback(null);
    },
    close: () => undefined
  };
  return {messages, socket};
};

const createMemoryStreams = () => {
  const streams: Array<{filePath: string; lines: string[]; stream: Writable}> = [];
  const createStream = (filePath: string) => {
    const lines: string[] = [];
    const stream = new Writable({
      write: (chunk, _encoding, callback) => {
        lines.push(String(chunk));
        callback();
      }
    });
    streams.push({filePath, lines, stream});
    return stream;
  };
  return {streams, createStream};
};

const typicalRequest = () =>
  createRequest({
    url: '/path?query=value',
    headers: {
      host: 'example.com',
      referer: 'https://ref.example/',
      'x-forwarded-for': '203.0.113.7'
    },
    socket: {remoteAddress: '192.168.100.5'}
  });

describe('structured log sink', () => {
  it('emits one info record with the request fields', () => {
    const logger = createLoggerSpy();
    const sink = createStructuredLogSink({logger});

    sink.write(createEvent({request: typicalRequest(), status: 200, size: 100, durationNs: 302_000_000n}));

    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith('GET /path?query=value HTTP/1.1', {
      module: 'request.handler',
      tag: 'request_handled',
      'http.method': 'GET',
      'http.protocol': 'HTTP/1.1',
      'http.uri': '/path?query=value',
      'http.path': '/path',
      'http.host': 'example.com',
      'http.status': 200,
      'http.bytes': 100,
      dur: 0.302,
      ts: '2026-03-04T05:06:07.890Z',
      'http.ref': 'https://ref.example/',
      'http.user': '203.0.113.7',
      'http.remote': '192.168.100.5'
    });
  });

  it('merges caller context without letting it override request fields', () => {
    const logger = createLoggerSpy();
    const sink = createStructuredLogSink({
      logger,
      context: {tag: 'custom', 'http.status': 999, service_version: '1.2.3'}
    });

    sink.write(createEvent({status: 404}));

    const [, fields] = logger.info.mock.calls[0];
    expect(fields).toMatchObject({tag: 'request_handled', 'http.status': 404, service_version: '1.2.3'});
    expect(fields).not.toHaveProperty(['module']);
    expect(fields).not.toHaveProperty(['http.remote']);
  });

  it('logs the http2 :authority as the host', () => {
    const logger = createLoggerSpy();

    createStructuredLogSink({logger}).write(
      createEvent({
        request: createRequest({
          url: '/orders',
          httpVersion: '2.0',
          httpVersionMajor: 2,
          headers: {':authority': 'api.example.com'}
        })
      })
    );

    expect(logger.info).toHaveBeenCalledTimes(1);
    const [message, fields] = logger.info.mock.calls[0];
    expect(message).toBe('GET /orders HTTP/2.0');
    expect(fields).toMatchObject({'http.host': 'api.example.com', 'http.uri': '/orders', 'http.path': '/orders'});
  });

  it('writes a JSON line through the structured logger', () => {
    const lines: string[] = [];
    const logger = createStructuredLogger({
      service: 'orders',
      env: 'test',
      level: 'info',
      now: () => new Date('2026-03-04T05:06:08.000Z'),
      writer: {
        stdout: {
          write: (chunk: string | Uint8Array) => {
            lines.push(String(chunk));
            return true;
          }
        },
        stderr: {write: () => true}
      }
    });

    createStructuredLogSink({logger}).write(
      createEvent({
        request: createRequest({method: 'DELETE', url: '/orders/7', httpVersion: '2.0', httpVersionMajor: 2}),
        status: 204,
        durationNs: 1_500_000_000n
      })
    );

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toEqual({
      module: 'request.handler',
      tag: 'request_handled',
      'http.method': 'DELETE',
      'http.protocol': 'HTTP/2.0',
      'http.uri': '/orders/7',
      'http.path': '/orders/7',
      'http.host': 'example.com',
      'http.status': 204,
      'http.bytes': 0,
      dur: 1.5,
      ts: '2026-03-04T05:06:07.890Z',
      'http.ref': '',
      'http.user': '',
      time: '2026-03-04T05:06:08.000Z',
      level: 'info',
      service: 'orders',
      env: 'test',
      msg: 'DELETE /orders/7 HTTP/2.0'
    });
  });

  it('converts nanoseconds to seconds', () => {
    expect(durationSeconds(0n)).toBe(0);
    expect(durationSeconds(1_500_000_000n)).toBe(1.5);
    expect(durationSeconds(302_000_000n)).toBe(0.302);
  });
});

describe('statsd log sink', () => {
  it('sends the timing and counter lines for each request', () => {
    const {messages, socket} = createRecordingSocket();
    const transport = createDatagramTransport({
      host: '127.0.0.1',
      port: 8125,
      namespace: 'service.logging.live.',
      tags: ['test'],
      socket
    });
    const sink = createStatsdLogSink({transport});

    sink.write(
      createEvent({request: createRequest({url: 'http://example.com'}), status: 200, size: 100, durationNs: 302_000_000n})
    );

    expect(messages).toEqual([
      'service.logging.live.request.response_time:302.000000|ms|#test,endpoint:/,statusCode:200,method:GET',
      'service.logging.live.request.count:1|c|#test,endpoint:/,statusCode:200,method:GET'
    ]);

    sink.write(
      createEvent({
        request: createRequest({method: 'POST', url: 'http://example.com/path/here'}),
        status: 200,
        size: 100,
        durationNs: 102_000_000n
      })
    );

    expect(messages.slice(2)).toEqual([
      'service.logging.live.request.response_time:102.000000|ms|#test,endpoint:/path/here,statusCode:200,method:POST',
      'service.logging.live.request.count:1|c|#test,endpoint:/path/here,statusCode:200,method:POST'
    ]);
  });

  it('tags by path, never by query string', () => {
    const [timing, count] = buildRequestMetricLines(
      createEvent({request: createRequest({url: '/search?q=shoes'}), status: 500, durationNs: 1_234_567n})
    );

    expect(timing).toEqual({
      name: 'request.response_time',
      value: '1.234567',
      type: 'ms',
      tags: ['endpoint:/search', 'statusCode:500', 'method:GET']
    });
    expect(count).toEqual({
      name: 'request.count',
      value: '1',
      type: 'c',
      tags: ['endpoint:/search', 'statusCode:500', 'method:GET']
    });
  });

  it('keeps a client path from injecting extra tags', () => {
    const {messages, socket} = createRecordingSocket();
    const sink = createStatsdLogSink({
      transport: createDatagramTransport({host: '127.0.0.1', port: 8125, tags: ['test'], socket})
    });

    sink.write(
      createEvent({request: createRequest({url: '/a,statusCode:500|c#x y'}), status: 200, durationNs: 1_000_000n})
    );

    expect(messages).toEqual([
      'request.response_time:1.000000|ms|#test,endpoint:/a_statusCode:500_c,statusCode:200,method:GET',
      'request.count:1|c|#test,endpoint:/a_statusCode:500_c,statusCode:200,method:GET'
    ]);
    expect(sanitizeTagValue('/a b\tc|d#e,f')).toBe('/a_b_c_d_e_f');
  });

  it('drops metrics the transport fails to send', () => {
    const logger = createLoggerSpy();
    const sendFailure = new Error('socket closed');
    const sink = createStatsdLogSink({
      transport: {
        send: () => {
          throw sendFailure;
        }
      },
      logger
    });

    expect(() => sink.write(createEvent())).not.toThrow();
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'statsd metric dropped', {
      metric: 'request.response_time',
      cause: sendFailure
    });
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'statsd metric dropped', {
      metric: 'request.count',
      cause: sendFailure
    });
  });

  it('formats milliseconds with six fractional digits', () => {
    expect(durationMilliseconds(302_000_000n)).toBe('302.000000');
    expect(durationMilliseconds(1_500n)).toBe('0.001500');
  });
});

describe('healthd log sink', () => {
  const directories: string[] = [];

  afterEach(() => {
    for (const directory of directories.splice(0)) {
      rmSync(directory, {recursive: true, force: true});
    }
  });

  it('formats the enhanced health line', () => {
    const line = formatHealthdLine(
      createEvent({request: typicalRequest(), status: 200, size: 100, durationNs: 302_000_000n})
    );

    expect(line).toBe('1772600767.890"/path"200"0.302"0.302"203.0.113.7\n');
  });

  it('leaves the forwarded-for field empty when the header is absent', () => {
    expect(formatHealthdLine(createEvent({status: 503, durationNs: 1_000_000n}))).toBe(
      '1772600767.890"/"503"0.001"0.001"\n'
    );
  });

  it('writes formatted lines to the writer', () => {
    const lines: string[] = [];
    createHealthdLogSink({writer: {write: line => lines.push(line)}}).write(createEvent({status: 201}));

    expect(lines).toEqual(['1772600767.890"/"201"0.000"0.000"\n']);
  });

  it('names files by UTC hour', () => {
    expect(healthdLogFileName(new Date('2026-03-04T05:06:07.890Z'))).toBe('application.log.2026-03-04-05');
    expect(healthdLogFileName(new Date('2026-12-31T23:59:59.999Z'))).toBe('application.log.2026-12-31-23');
  });

  it('appends to hourly files and rotates when the hour changes', async () => {
    const directory = mkdtempSync(join(tmpdir(), 'healthd-'));
    directories.push(directory);
    let current = new Date('2026-03-04T05:10:00.000Z');
    const writer = createHealthdFileWriter({directory: join(directory, 'nested'), now: () => current});

    writer.write('first\n');
    writer.write('second\n');
    current = new Date('2026-03-04T06:00:00.000Z');
    writer.write('third\n');
    await writer.close();

    expect(readdirSync(join(directory, 'nested')).sort()).toEqual([
      'application.log.2026-03-04-05',
      'application.log.2026-03-04-06'
    ]);
    expect(readFileSync(join(directory, 'nested', 'application.log.2026-03-04-05'), 'utf8')).toBe('first\nsecond\n');
    expect(readFileSync(join(directory, 'nested', 'application.log.2026-03-04-06'), 'utf8')).toBe('third\n');
  });

  it('reopens the file on the next line after a stream error', async () => {
    const directory = mkdtempSync(join(tmpdir(), 'healthd-'));
    directories.push(directory);
    const logger = createLoggerSpy();
    const {streams, createStream} = createMemoryStreams();
    const writer = createHealthdFileWriter({
      directory,
      now: () => new Date('2026-03-04T05:10:00.000Z'),
      logger,
      createStream
    });

    writer.write('first\n');
    const failure = new Error('disk full');
    streams[0].stream.destroy(failure);
    await new Promise(resolve => setImmediate(resolve));
    writer.write('second\n');
    await writer.close();

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith('healthd log write failed', {
      file: 'application.log.2026-03-04-05',
      cause: failure
    });
    expect(streams.map(entry => entry.filePath)).toEqual([
      join(directory, 'application.log.2026-03-04-05'),
      join(directory, 'application.log.2026-03-04-05')
    ]);
    expect(streams[0].lines).toEqual(['first\n']);
    expect(streams[1].lines).toEqual(['second\n']);
  });

  it('forgets rotated streams once they have flushed', async () => {
    const directory = mkdtempSync(join(tmpdir(), 'healthd-'));
    directories.push(directory);
    const {streams, createStream} = createMemoryStreams();
    let current = new Date('2026-03-04T05:00:00.000Z');
    const writer = createHealthdFileWriter({directory, now: () => current, createStream});

    writer.write('a\n');
    current = new Date('2026-03-04T06:00:00.000Z');
    writer.write('b\n');
    current = new Date('2026-03-04T07:00:00.000Z');
    writer.write('c\n');

    expect(writer.pendingCloses()).toBe(2);
    await vi.waitFor(() => expect(writer.pendingCloses()).toBe(0));
    await writer.close();

    expect(writer.pendingCloses()).toBe(0);
    expect(streams.map(entry => entry.lines)).toEqual([['a\n'], ['b\n'], ['c\n']]);
  });
});
