import { createTicker } from './ticker';

describe('createTicker', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('calls back on every interval until stopped', () => {
    const callback = jest.fn();
    const ticker = createTicker(1000, callback, jest.fn());

    ticker.start();
    ticker.start();
    jest.advanceTimersByTime(3000);
    ticker.stop();
    jest.advanceTimersByTime(3000);

    expect(callback).toHaveBeenCalledTimes(3);
    expect(ticker.isRunning).toBe(false);
  });

  it('lets the callback stop the ticker', () => {
    let calls = 0;
    const ticker = createTicker(
      500,
      (self) => {
        calls++;
        if (calls === 2) self.stop();
      },
      jest.fn(),
    );

    ticker.start();
    jest.advanceTimersByTime(5000);

    expect(calls).toBe(2);
  });

  it('keeps running after the callback throws', () => {
    const failure = new Error('bad tick');
    const onError = jest.fn();
    const callback = jest.fn().mockImplementationOnce(() => {
      throw failure;
    });
    const ticker = createTicker(1000, callback, onError);

    ticker.start();
    jest.advanceTimersByTime(2000);
    ticker.stop();

    expect(onError).toHaveBeenCalledWith(failure);
    expect(callback).toHaveBeenCalledTimes(2);
  });
});
