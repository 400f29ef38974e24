export { VendorExtractor, cleanVendorName } from './vendor-extractor';
export { DateExtractor } from './date-extractor';
export { AmountExtractor, findMoneyTokens } from './amount-extractor';
export { CategoryExtractor, type CategoryScore } from './category-extractor';
export {
  emptyExtraction,
  type FieldExtraction,
  type FieldExtractor,
} from './types';
