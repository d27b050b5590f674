export interface ProviderEndpoints {
  coingeckoBaseUrl: string;
  defillamaBaseUrl: string;
  fearGreedUrl: string;
}

export const DEFAULT_ENDPOINTS: ProviderEndpoints = {
  coingeckoBaseUrl: "https://api.coingecko.com/api/v3",
  defillamaBaseUrl: "https://api.llama.fi",
  fearGreedUrl: "https://api.alternative.me/fng/",
};
