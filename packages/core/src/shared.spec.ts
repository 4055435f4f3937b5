import { expect } from 'chai';
import { Event } from './event.js';
import { reportError } from './shared.js';

describe('core: reportError', () => {
  const originalError = console.error;
  let logged: unknown[][] = [];
  beforeEach(() => {
    logged = [];
    console.error = (...args: unknown[]) => {
      logged.push(args);
    };
  });
  afterEach(() => {
    console.error = originalError;
  });

  it('should log the cause', () => {
    const cause = new Error('lost');
    reportError(cause);
    expect(logged).to.deep.equal([[cause]]);
  });
  it('should report isolated hook failures', () => {
    const event = new Event<number>({ onError: reportError });
    const failure = new Error('hook failed');
    const values: number[] = [];
    event.hook(() => {
      throw failure;
    });
    event.hook((n) => values.push(n));
    event.emit(1);
    expect(logged).to.deep.equal([[failure]]);
    expect(values).to.deep.equal([1]);
  });
});
