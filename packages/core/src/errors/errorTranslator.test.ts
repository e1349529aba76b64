import {
  TransportHttpError,
  TransportTimeoutError,
  TransportUnreachableError,
  describeFailure,
} from './errors';
import {
  CONNECTION_FAILED_OVERALL,
  CONNECTION_REQUIRED_NOTE,
  errorCritique,
  summarizeErrorBody,
} from './errorTranslator';

describe('summarizeErrorBody', () => {
  it('unwraps error.message from a JSON body', () => {
    expect(summarizeErrorBody('{"error":{"message":"Invalid model","code":400}}')).toBe('Invalid model');
  });

  it('uses the whole error value when it has no message', () => {
    expect(summarizeErrorBody('{"error":"quota exhausted"}')).toBe('quota exhausted');
    expect(summarizeErrorBody('{"error":{"code":418}}')).toBe('{"code":418}');
  });

  it('caps an unwrapped error value at the preview length', () => {
    expect(summarizeErrorBody(JSON.stringify({ error: 'x'.repeat(5000) }))).toBe('x'.repeat(200));
    expect(summarizeErrorBody(JSON.stringify({ error: { message: 'y'.repeat(300) } }))).toBe('y'.repeat(200));
  });

  it('truncates other bodies and keeps them on one line', () => {
    expect(summarizeErrorBody('x'.repeat(300))).toHaveLength(200);
    expect(summarizeErrorBody('bad\ngateway')).toBe('bad gateway');
  });
});

describe('errorCritique', () => {
  it('puts the diagnostic first and the remediation last', () => {
    expect(errorCritique({ diagnostic: 'Cannot connect', remediation: ['Start it', 'Check the URL'] })).toEqual({
      critical: ['Cannot connect'],
      major: [CONNECTION_REQUIRED_NOTE],
      recommendations: ['Start it', 'Check the URL'],
      overall: CONNECTION_FAILED_OVERALL,
    });
  });
});

describe('describeFailure', () => {
  it('recognizes transport errors', () => {
    expect(describeFailure(new TransportTimeoutError('http://x', 5))).toEqual({ kind: 'timeout' });
    expect(describeFailure(new TransportUnreachableError('http://x', 'ECONNREFUSED'))).toEqual({ kind: 'unreachable' });
    expect(describeFailure(new TransportHttpError('http://x', 502, 'Bad Gateway'))).toEqual({
      kind: 'http',
      status: 502,
      body: 'Bad Gateway',
    });
  });

  it('treats everything else as unexpected', () => {
    expect(describeFailure(new TypeError('bad input'))).toEqual({
      kind: 'unexpected',
      typeName: 'TypeError',
      message: 'bad input',
    });
    expect(describeFailure('boom')).toEqual({ kind: 'unexpected', typeName: 'string', message: 'boom' });
  });
});
