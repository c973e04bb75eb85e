import {
    MapperError, ScanError, Scanner, TokenType, boolMapper, flagValueToken, floatMapper,
    intMapper, scanFromTokens, stringListMapper, stringMapper
} from '../src/index.js';

function scanOf(value: Parameters<typeof flagValueToken>[0]): Scanner {
    return scanFromTokens(flagValueToken(value));
}

describe('Scanner', () => {
    it('peek returns EOL when empty', () => {
        const scan = new Scanner();
        expect(scan.peek().type).toBe(TokenType.EOL);
        expect(scan.len()).toBe(0);
    });

    it('pop consumes tokens in order', () => {
        const scan = scanFromTokens(flagValueToken('a'), flagValueToken('b'));
        expect(scan.pop().value).toBe('a');
        expect(scan.len()).toBe(1);
        expect(scan.pop().value).toBe('b');
    });

    it('popValue rejects EOL', () => {
        expect(() => new Scanner().popValue('string')).toThrow('expected string value but got EOL');
    });

    it('popValue rejects flag tokens', () => {
        const scan = scanFromTokens({ type: TokenType.FLAG, value: 'verbose' });
        expect(() => scan.popValue('int')).toThrow(ScanError);
    });
});

describe('Mappers', () => {
    it('string', () => {
        expect(stringMapper.decode(scanOf('hello'))).toBe('hello');
        expect(stringMapper.decode(scanOf(''))).toBe('');
        expect(stringMapper.decode(scanOf(42))).toBe('42');
        expect(() => stringMapper.decode(scanOf({ a: 1 }))).toThrow('expected a string but got {"a":1}');
    });

    it('int', () => {
        expect(intMapper.decode(scanOf('-12'))).toBe(-12);
        expect(intMapper.decode(scanOf(7))).toBe(7);
        expect(() => intMapper.decode(scanOf('1.5'))).toThrow('expected an int but got "1.5"');
        expect(() => intMapper.decode(scanOf(1.5))).toThrow(MapperError);
    });

    it('float', () => {
        expect(floatMapper.decode(scanOf('1.5'))).toBe(1.5);
        expect(floatMapper.decode(scanOf(3))).toBe(3);
        expect(() => floatMapper.decode(scanOf(''))).toThrow('expected a float but got ""');
        expect(() => floatMapper.decode(scanOf('abc'))).toThrow(MapperError);
    });

    it('bool', () => {
        expect(boolMapper.decode(scanOf('YES'))).toBe(true);
        expect(boolMapper.decode(scanOf('0'))).toBe(false);
        expect(boolMapper.decode(scanOf(true))).toBe(true);
        expect(() => boolMapper.decode(scanOf('maybe'))).toThrow('expected a bool but got "maybe"');
    });

    it('string list', () => {
        expect(stringListMapper().decode(scanOf('a,b,c'))).toEqual(['a', 'b', 'c']);
        expect(stringListMapper(':').decode(scanOf('/bin:/usr/bin'))).toEqual(['/bin', '/usr/bin']);
        expect(stringListMapper().decode(scanOf(''))).toEqual([]);
        expect(stringListMapper().decode(scanOf(['x', 2, false]))).toEqual(['x', '2', 'false']);
        expect(() => stringListMapper().decode(scanOf([['nested']]))).toThrow(MapperError);
        expect(() => stringListMapper().decode(scanOf(null))).toThrow('expected a list but got null');
    });
});
