const repeatingWhitespace = /\s+/g;
const punctuation = /[^\w\s]/g;
const combiningMarks = /[\u0300-\u036f]/g;

export const normalizeDescription = (input: string): string => {
  return input
    .normalize('NFKD')
    .replace(combiningMarks, '')
    .replace(punctuation, ' ')
    .replace(repeatingWhitespace, ' ')
    .trim()
    .toLowerCase();
};

export const descriptionWords = (input: string): Set<string> => {
  const normalized = normalizeDescription(input);
  return new Set(normalized ? normalized.split(' ') : []);
};

export const countWords = (input: string): number => {
  const trimmed = input.trim();
  return trimmed ? trimmed.split(repeatingWhitespace).length : 0;
};
