import { encodePlusCode } from '../../src/utils/plusCode';

describe('encodePlusCode', () => {
  it('should encode a full ten-digit code', () => {
    expect(encodePlusCode(47.36559, 8.524997)).toBe('8FVC9G8F+6X');
  });

  it('should pad short codes', () => {
    expect(encodePlusCode(47.36559, 8.524997, 4)).toBe('8FVC0000+');
  });

  it('should reject odd lengths below ten', () => {
    expect(() => encodePlusCode(47.36559, 8.524997, 3)).toThrow(RangeError);
  });

  it('should reject non-finite coordinates', () => {
    expect(() => encodePlusCode(Number.NaN, 0)).toThrow(RangeError);
  });
});
