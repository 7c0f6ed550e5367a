import { decodeArray, decodePayload, encodePayload, isPayload } from '../codec';

describe('payload codec', () => {
  test('decodes a JSON object from a buffer', () => {
    expect(decodePayload(Buffer.from('{"state":"ON","brightness":128}'))).toEqual({ state: 'ON', brightness: 128 });
  });

  test('decodes a JSON object from a string', () => {
    expect(decodePayload('{"state":"online"}')).toEqual({ state: 'online' });
  });

  test('non-JSON, arrays and scalars are no data', () => {
    expect(decodePayload(Buffer.from('online'))).toBeUndefined();
    expect(decodePayload(Buffer.from('[1,2]'))).toBeUndefined();
    expect(decodePayload(Buffer.from('42'))).toBeUndefined();
    expect(decodePayload(Buffer.from('null'))).toBeUndefined();
    expect(decodePayload(Buffer.from(''))).toBeUndefined();
  });

  test('invalid UTF-8 is no data', () => {
    expect(decodePayload(Buffer.from([0x7b, 0xff, 0xfe, 0x7d]))).toBeUndefined();
  });

  test('encodes compact JSON', () => {
    expect(encodePayload({ state: 'ON', transition: 0 })).toBe('{"state":"ON","transition":0}');
  });

  test('decodeArray accepts arrays only', () => {
    expect(decodeArray(Buffer.from('[{"ieee_address":"0x01"}]'))).toEqual([{ ieee_address: '0x01' }]);
    expect(decodeArray(Buffer.from('{"a":1}'))).toBeUndefined();
    expect(decodeArray(Buffer.from('not json'))).toBeUndefined();
  });

  test('isPayload rejects arrays and null', () => {
    expect(isPayload({})).toBe(true);
    expect(isPayload([])).toBe(false);
    expect(isPayload(null)).toBe(false);
    expect(isPayload('x')).toBe(false);
  });
});
