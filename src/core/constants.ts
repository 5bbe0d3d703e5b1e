/**
 * Centralized constants for the application
 */

// User-facing messages
export const ERROR_MESSAGES = {
	EMPTY_TEXT: 'Please enter text to analyze.',
	EMPTY_URL: 'Please enter a URL.',
	INVALID_URL: 'Please enter a valid http(s) URL.',
	NO_PAGE_TEXT: 'No readable text was found at that URL.',
	UNSUPPORTED_CONTENT: 'The URL does not point to a text or HTML page.',
	TEXT_TOO_LONG: 'The text is too long to analyze.',
	FETCH_FAILED: 'Error fetching URL',
	LEXICON_MISSING: 'Word list not found',
	LEXICON_UNREADABLE: 'Word list could not be decoded',
} as const;

// Engine constants
export const SCORING = {
	/** Keeps polarity and subjectivity finite when there is nothing to divide by */
	EPSILON: 1e-6,
	COMPLEX_SYLLABLE_THRESHOLD: 3,
	FOG_WEIGHT: 0.4,
	NEUTRAL_BAND: 0.05,
} as const;

/** ASCII punctuation removed by the normalizer */
export const PUNCTUATION = '!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~';

export const VOWELS: ReadonlySet<string> = new Set(['a', 'e', 'i', 'o', 'u', 'y']);

/** Inflectional endings ignored when deciding whether a word is complex */
export const INFLECTIONAL_SUFFIXES = ['es', 'ed', 'ing'] as const;

export const PERSONAL_PRONOUNS: ReadonlySet<string> = new Set([
	'i',
	'me',
	'my',
	'mine',
	'you',
	'your',
	'yours',
	'he',
	'him',
	'his',
	'she',
	'her',
	'hers',
	'it',
	'its',
	'we',
	'us',
	'our',
	'ours',
	'they',
	'them',
	'their',
	'theirs',
]);

// Word list defaults
export const LEXICON_FILES = {
	POSITIVE: 'positive-words.txt',
	NEGATIVE: 'negative-words.txt',
	STOP_WORDS: 'stopwords.txt',
} as const;

export const DEFAULT_ENCODINGS = ['utf-8', 'latin1'] as const;

// Size and network limits
export const LIMITS = {
	MAX_TEXT_LENGTH: 1_000_000,
	FETCH_TIMEOUT: 10_000,
	FETCH_RETRIES: 2,
	RETRY_DELAY: 500,
} as const;

export const DEFAULT_USER_AGENT =
	'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

// Regex Patterns
export const PATTERNS = {
	URL: /^https?:\/\/[^\s/$.?#].[^\s]*$/i,
	SENTENCE_BOUNDARY: /[.!?]+\s*/,
	WHITESPACE: /\s+/,
} as const;

export const TEXT_CONTENT_TYPES = ['text/html', 'application/xhtml+xml', 'text/plain'] as const;
