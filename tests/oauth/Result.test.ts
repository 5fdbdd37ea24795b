import { andThen, err, map, ok, Result } from '../../src/oauth/Result';

describe('Result', () => {
  it('should build tagged variants', () => {
    expect(ok(1)).toEqual({ ok: true, value: 1 });
    expect(err('boom')).toEqual({ ok: false, error: 'boom' });
  });

  describe('map', () => {
    it('should transform a success', () => {
      expect(map(ok(2), (n) => n * 10)).toEqual({ ok: true, value: 20 });
    });

    it('should pass an error through unchanged', () => {
      const failure: Result<number, string> = err('boom');
      const fn = jest.fn((n: number) => n * 10);

      expect(map(failure, fn)).toBe(failure);
      expect(fn).not.toHaveBeenCalled();
    });
  });

  describe('andThen', () => {
    const half = (n: number): Result<number, string> => (n % 2 === 0 ? ok(n / 2) : err(`${n} is odd`));

    it('should chain successes', () => {
      expect(andThen(ok(8), half)).toEqual({ ok: true, value: 4 });
    });

    it('should return the next stage error', () => {
      expect(andThen(ok(3), half)).toEqual({ ok: false, error: '3 is odd' });
    });

    it('should short-circuit on an earlier error', () => {
      const failure: Result<number, string> = err('earlier');
      const next = jest.fn(half);

      expect(andThen(failure, next)).toBe(failure);
      expect(next).not.toHaveBeenCalled();
    });
  });
});
