import { describe, it, expect } from 'vitest';
import {
  ValohaiError,
  NetworkError,
  NotFoundError,
  ValidationError,
  AuthenticationError,
  PermissionDeniedError,
  RateLimitError,
  ResponseFormatError,
  ServerError,
} from '../src/errors.js';

describe('ValohaiError', () => {
  it('should create error with all properties', () => {
    const error = new ValohaiError('Test message', 'TEST_CODE', 500, { extra: 'data' });

    expect(error.message).toBe('Test message');
    expect(error.code).toBe('TEST_CODE');
    expect(error.status).toBe(500);
    expect(error.details).toEqual({ extra: 'data' });
    expect(error.name).toBe('ValohaiError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should work without details', () => {
    const error = new ValohaiError('Message', 'CODE', 400);

    expect(error.details).toBeUndefined();
  });
});

describe('NetworkError', () => {
  it('should create with message', () => {
    const error = new NetworkError('Connection failed');

    expect(error.message).toBe('Connection failed');
    expect(error.code).toBe('NETWORK_ERROR');
    expect(error.status).toBe(0);
    expect(error.name).toBe('NetworkError');
    expect(error).toBeInstanceOf(ValohaiError);
  });

  it('should include cause', () => {
    const cause = new Error('Original error');
    const error = new NetworkError('Request failed', cause);

    expect(error.cause).toBe(cause);
  });
});

describe('ResponseFormatError', () => {
  it('should carry the response status and validation issues', () => {
    const error = new ResponseFormatError('Unexpected response', 200, [{ path: ['status'] }]);

    expect(error.code).toBe('INVALID_RESPONSE');
    expect(error.status).toBe(200);
    expect(error.details).toEqual([{ path: ['status'] }]);
    expect(error.name).toBe('ResponseFormatError');
  });

  it('should default status to 0', () => {
    expect(new ResponseFormatError('bad').status).toBe(0);
  });
});

describe('NotFoundError', () => {
  it('should create with resource and id', () => {
    const error = new NotFoundError('Execution', 'exec-1');

    expect(error.message).toBe('Execution not found: exec-1');
    expect(error.code).toBe('NOT_FOUND');
    expect(error.status).toBe(404);
    expect(error.name).toBe('NotFoundError');
  });
});

describe('ValidationError', () => {
  it('should create with details', () => {
    const error = new ValidationError('Invalid payload', { step: ['This field is required.'] });

    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.status).toBe(400);
    expect(error.details).toEqual({ step: ['This field is required.'] });
  });
});

describe('AuthenticationError', () => {
  it('should use default message', () => {
    const error = new AuthenticationError();

    expect(error.message).toBe('Authentication required');
    expect(error.code).toBe('UNAUTHORIZED');
    expect(error.status).toBe(401);
  });
});

describe('PermissionDeniedError', () => {
  it('should use default message', () => {
    const error = new PermissionDeniedError();

    expect(error.message).toBe('Permission denied');
    expect(error.code).toBe('FORBIDDEN');
    expect(error.status).toBe(403);
  });
});

describe('RateLimitError', () => {
  it('should include retryAfter', () => {
    const error = new RateLimitError('Slow down', 30);

    expect(error.retryAfter).toBe(30);
    expect(error.status).toBe(429);
  });
});

describe('ServerError', () => {
  it('should default to 500', () => {
    const error = new ServerError('Internal error');

    expect(error.status).toBe(500);
    expect(error.code).toBe('SERVER_ERROR');
  });

  it('should accept a custom status', () => {
    expect(new ServerError('Unavailable', 503).status).toBe(503);
  });
});
