/**
 * Block and inline keywords the markup accepts, plus spellings people
 * commonly type instead.
 *
 * @module analysis/keywords
 */

export const MARKER_DELIMITER = '#';
export const FULL_WIDTH_DELIMITER = '＃';
export const FULL_WIDTH_SPACE = '　';
export const BLOCK_CLOSE = '##';

export const KNOWN_KEYWORDS: readonly string[] = [
  'bold',
  'italic',
  'heading1',
  'heading2',
  'heading3',
  'heading4',
  'heading5',
  'box',
  'highlight',
  'details',
  'spoiler',
  'toc',
  'image',
];

export const KEYWORD_ALIASES: Readonly<Record<string, string>> = {
  strong: 'bold',
  b: 'bold',
  emphasis: 'italic',
  em: 'italic',
  i: 'italic',
  header: 'heading1',
  heading: 'heading1',
  title: 'heading1',
  h1: 'heading1',
  h2: 'heading2',
  h3: 'heading3',
  frame: 'box',
  border: 'box',
  marker: 'highlight',
  mark: 'highlight',
  collapse: 'details',
  accordion: 'details',
  hidden: 'spoiler',
  index: 'toc',
  contents: 'toc',
  img: 'image',
  pic: 'image',
  picture: 'image',
  photo: 'image',
};

export function isDelimiter(ch: string): boolean {
  return ch === MARKER_DELIMITER || ch === FULL_WIDTH_DELIMITER;
}
