/** Goals listed by `help` in interactive mode. */
export const HELP_GOALS: readonly string[] = [
  'What are the top complaints for Electronics products?',
  'Compare the Electronics and Home & Kitchen categories',
  'Find products with high discounts but low ratings. What is going wrong?',
  'Analyze reviews for products rated below 4.0 and suggest improvements',
  'What are the best-rated products under ₹2000?',
];

/** Goals run in sequence by `--example`. */
export const EXAMPLE_GOALS: readonly string[] = [
  'Compare the Printers and Speakers categories. Which one has better customer satisfaction and where should we focus?',
  'Analyze customer complaints for products with ratings below 4.0. What are the main issues and how can we address them?',
  'Find the top 5 products by rating and analyze what makes them successful.',
];
