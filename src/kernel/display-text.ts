/** First character upper-cased, the rest lower-cased. */
export const capitalizeWord = (word: string): string =>
  word.length === 0 ? word : `${word.charAt(0).toUpperCase()}${word.slice(1).toLowerCase()}`;
