import { isHttpUrl, isValidEmailAddress, isValidPort } from '../config.validators';

describe('isValidEmailAddress', () => {
  it.each(['probe@example.com', 'first.last+tag@mail.example.org'])('should accept %s', (address) => {
    expect(isValidEmailAddress(address)).toBe(true);
  });

  it.each(['', 'probe', 'probe@', '@example.com', 'probe@localhost', 'Probe <probe@example.com>', 'a b@example.com'])(
    'should reject "%s"',
    (address) => {
      expect(isValidEmailAddress(address)).toBe(false);
    },
  );

  it('should reject addresses longer than 254 characters', () => {
    expect(isValidEmailAddress(`${'a'.repeat(250)}@example.com`)).toBe(false);
  });
});

describe('isHttpUrl', () => {
  it('should accept http and https URLs', () => {
    expect(isHttpUrl('http://example.com/result')).toBe(true);
    expect(isHttpUrl('https://example.com/result?id=1')).toBe(true);
  });

  it('should reject other schemes and relative URLs', () => {
    expect(isHttpUrl('ftp://example.com')).toBe(false);
    expect(isHttpUrl('/result')).toBe(false);
    expect(isHttpUrl('not a url')).toBe(false);
  });
});

describe('isValidPort', () => {
  it('should accept ports in range', () => {
    expect(isValidPort(1)).toBe(true);
    expect(isValidPort(465)).toBe(true);
    expect(isValidPort(65535)).toBe(true);
  });

  it('should reject out-of-range and fractional ports', () => {
    expect(isValidPort(0)).toBe(false);
    expect(isValidPort(65536)).toBe(false);
    expect(isValidPort(993.5)).toBe(false);
  });
});
