export { refreshQuotes, type RefreshQuotesDeps } from "./refresh-quotes";
export { processTrades, type ProcessTradesDeps } from "./process-trades";
