import { camelCaseName, lookupKeys, underscoreName } from '../src/names.js';

describe('Name mapping', () => {
    it('underscore form replaces every hyphen', () => {
        expect(underscoreName('my-flag')).toBe('my_flag');
        expect(underscoreName('a-b-c')).toBe('a_b_c');
        expect(underscoreName('plain')).toBe('plain');
    });

    it('camel-case form capitalizes words after the first', () => {
        expect(camelCaseName('my-flag')).toBe('myFlag');
        expect(camelCaseName('a-b-c')).toBe('aBC');
        expect(camelCaseName('plain')).toBe('plain');
    });

    it('camel-case form lower-cases only the first character', () => {
        expect(camelCaseName('API-key')).toBe('aPIKey');
    });

    it('empty words between hyphens are tolerated', () => {
        expect(camelCaseName('my--flag')).toBe('myFlag');
        expect(camelCaseName('-leading')).toBe('leading');
        expect(camelCaseName('trailing-')).toBe('trailing');
        expect(camelCaseName('')).toBe('');
        expect(camelCaseName('-')).toBe('');
    });

    it('lookup keys try the underscore form first', () => {
        expect(lookupKeys('db-host')).toEqual(['db_host', 'dbHost']);
    });
});
