import { IncomingMessage, ServerResponse } from 'node:http';
import { Socket } from 'node:net';
import { DomainErrorCode } from '@domain/errors/domain.errors';
import { callerIdFrom, disconnectSignal } from './request-params';

describe('callerIdFrom', () => {
  it('should read the caller from the header', () => {
    expect(callerIdFrom({ 'x-user-id': ' user-1 ' })).toBe('user-1');
  });

  it('should take the first of repeated headers', () => {
    expect(callerIdFrom({ 'x-user-id': ['user-1', 'user-2'] })).toBe('user-1');
  });

  it('should reject a request without a caller', () => {
    expect(() => callerIdFrom({})).toThrow('x-user-id: header is required');
    expect(() => callerIdFrom({ 'x-user-id': '  ' })).toThrow(
      expect.objectContaining({ code: DomainErrorCode.REQUIRED_FIELD, field: 'x-user-id' })
    );
  });
});

describe('disconnectSignal', () => {
  it('should abort when the connection closes before the response is written', () => {
    const response = new ServerResponse(new IncomingMessage(new Socket()));
    const signal = disconnectSignal(response);

    expect(signal.aborted).toBe(false);
    response.emit('close');
    expect(signal.aborted).toBe(true);
  });
});
