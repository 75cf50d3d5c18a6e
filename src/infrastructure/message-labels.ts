/**
 * Chat text that accompanies the audio, in the narration language.
 */
export interface MessageLabels {
    articleCount(count: number): string;
    readFullArticle: string;
}

interface LabelSet {
    language: string;
    articleForms: Partial<Record<Intl.LDMLPluralRule, string>> & { other: string };
    readFullArticle: string;
}

const LABEL_SETS: LabelSet[] = [
    {
        language: 'en',
        articleForms: { one: 'article', other: 'articles' },
        readFullArticle: 'Read full article',
    },
    {
        language: 'ru',
        articleForms: { one: 'статья', few: 'статьи', many: 'статей', other: 'статьи' },
        readFullArticle: 'Читать полностью',
    },
];

const DEFAULT_LANGUAGE = 'en';

function findLabelSet(language: string): LabelSet {
    const base = language.toLowerCase().split('-')[0];
    return (
        LABEL_SETS.find((set) => set.language === base) ??
        LABEL_SETS.find((set) => set.language === DEFAULT_LANGUAGE) ??
        LABEL_SETS[0]
    );
}

/**
 * Unknown languages get English labels.
 */
export function messageLabels(language: string): MessageLabels {
    const set = findLabelSet(language);
    const plurals = new Intl.PluralRules(set.language);

    return {
        articleCount: (count) => {
            const noun = set.articleForms[plurals.select(count)] ?? set.articleForms.other;
            return `${count} ${noun}`;
        },
        readFullArticle: set.readFullArticle,
    };
}
