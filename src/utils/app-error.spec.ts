import { AppError } from './app-error';

class SampleError extends AppError {}

describe('AppError', () => {
  it('names errors after the concrete class', () => {
    const error = new SampleError('boom');

    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(SampleError);
    expect(error.name).toBe('SampleError');
    expect(error.message).toBe('boom');
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    expect(new SampleError('wrapped', { cause }).cause).toBe(cause);
  });
});
