export {
  discountRate,
  calculateQuote,
  summarize,
  quotePrice,
  type Quote,
  type QuoteLine,
  type QuoteLineInput,
} from './rules.js';

export { estimateDelivery, leadTimeDays, type DeliveryEstimate } from './delivery.js';

export { findSimilarQuotes, extractSearchTerms } from './history.js';
