export {
    MarketDataClient,
    type HttpGet,
    type HttpRequestConfig,
    type HttpResponse,
    type MarketDataClientOptions,
    type MarketDataSource,
} from './client';
