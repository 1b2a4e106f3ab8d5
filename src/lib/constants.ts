export const MIN_TOKEN_LENGTH = 3;

export const PAGE_EXTENSIONS = ['.md', '.markdown'];

export const DEFAULT_EXCLUDE = [
  'node_modules',
  'vendor',
  '_site',
  '_includes',
  '_layouts',
  '_sass',
  '.jekyll-cache',
];

export const DEFAULT_REQUIRED_FRONTMATTER = ['title', 'layout'];

export const DEFAULT_DOCS_DIR = 'docs';

export const DEFAULT_DUPLICATE_SECTION_THRESHOLD = 0.9;

// Upper bound on plain text stored per search document
export const SEARCH_TEXT_LIMIT = 2000;
