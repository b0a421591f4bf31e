import {
    FALLBACK_FLAG,
    findLanguageByFlag,
    getFlagEmoji,
    isValidLanguageCode,
    sortByPriority,
    toRegionalIndicators,
} from '../../../../src/domain/entities/Language';

describe('Language', () => {
    describe('isValidLanguageCode', () => {
        it.each(['en', 'fr', 'pt-BR', 'zh_hans', 'fil'])('should accept %s', (code) => {
            expect(isValidLanguageCode(code)).toBe(true);
        });

        it.each(['', 'auto', 'english', 'e', 'en-', '12'])('should reject "%s"', (code) => {
            expect(isValidLanguageCode(code)).toBe(false);
        });
    });

    describe('getFlagEmoji', () => {
        it('should use built-in flags', () => {
            expect(getFlagEmoji('fr')).toBe('🇫🇷');
            expect(getFlagEmoji('EN')).toBe('🇬🇧');
        });

        it('should prefer chat overrides', () => {
            expect(getFlagEmoji('en', { en: '🇺🇸' })).toBe('🇺🇸');
        });

        it('should spell unknown two-letter codes with regional indicators', () => {
            expect(getFlagEmoji('it')).toBe('🇮🇹');
            expect(toRegionalIndicators('jp')).toBe('🇯🇵');
        });

        it('should fall back to the white flag', () => {
            expect(getFlagEmoji('fil')).toBe(FALLBACK_FLAG);
            expect(getFlagEmoji('pt-br')).toBe(FALLBACK_FLAG);
        });
    });

    describe('findLanguageByFlag', () => {
        it('should find an enabled language by its flag', () => {
            expect(findLanguageByFlag('🇩🇪', ['en', 'de'])).toBe('de');
        });

        it('should honour custom flags', () => {
            expect(findLanguageByFlag(' 🇺🇸 ', ['en', 'de'], { en: '🇺🇸' })).toBe('en');
        });

        it('should ignore languages that are not enabled', () => {
            expect(findLanguageByFlag('🇫🇷', ['en', 'de'])).toBeNull();
        });
    });

    describe('sortByPriority', () => {
        it('should order by priority and keep unknown languages last', () => {
            const sorted = sortByPriority(['xx', 'fr', 'yy', 'en'], ['en', 'es', 'fr']);
            expect(sorted).toEqual(['en', 'fr', 'xx', 'yy']);
        });

        it('should apply the limit after sorting', () => {
            expect(sortByPriority(['de', 'en', 'fr'], ['en', 'fr', 'de'], 2)).toEqual(['en', 'fr']);
        });
    });
});
