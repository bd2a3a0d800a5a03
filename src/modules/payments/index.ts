import type { ModuleDescriptor, ModuleHandle, SharedInfrastructure } from "../../composition/module-descriptor.js";

import { moduleLogger } from "../../platform/logger.js";

export const PAYMENTS_MODULE = "Payments";

export const paymentsPolicies = {
  GetPriceList: "payments.price-list.read",
} as const;

export interface PriceListItem {
  subscriptionPeriod: "Month" | "HalfYear";
  category: "New" | "Renewal";
  countryCode: string;
  amount: number;
  currency: string;
}

export const DEFAULT_PRICE_LIST: readonly PriceListItem[] = [
  { subscriptionPeriod: "Month", category: "New", countryCode: "PL", amount: 60, currency: "PLN" },
  { subscriptionPeriod: "HalfYear", category: "New", countryCode: "PL", amount: 320, currency: "PLN" },
  { subscriptionPeriod: "Month", category: "Renewal", countryCode: "PL", amount: 50, currency: "PLN" },
  { subscriptionPeriod: "HalfYear", category: "Renewal", countryCode: "PL", amount: 270, currency: "PLN" },
  { subscriptionPeriod: "Month", category: "New", countryCode: "US", amount: 15, currency: "USD" },
  { subscriptionPeriod: "HalfYear", category: "New", countryCode: "US", amount: 80, currency: "USD" },
];

export interface PaymentsModuleOptions {
  priceList?: readonly PriceListItem[];
}

export function createPaymentsModule(options: PaymentsModuleOptions = {}): ModuleDescriptor {
  return {
    name: PAYMENTS_MODULE,
    initialize(infrastructure: SharedInfrastructure): ModuleHandle {
      const logger = moduleLogger(infrastructure.logger, PAYMENTS_MODULE);
      const priceList = options.priceList ?? DEFAULT_PRICE_LIST;
      logger.debug({ items: priceList.length }, "Price list loaded");

      return {
        name: PAYMENTS_MODULE,
        policies: paymentsPolicies,
        endpoints: [
          {
            method: "GET",
            url: "/payments/price-list",
            policy: "GetPriceList",
            summary: "Subscription price list",
            async handle({ query }) {
              const countryCode = query["countryCode"]?.toUpperCase();
              const items = countryCode
                ? priceList.filter((item) => item.countryCode === countryCode)
                : priceList;
              return {
                items: items.map((item) => ({
                  subscription_period: item.subscriptionPeriod,
                  category: item.category,
                  country_code: item.countryCode,
                  amount: item.amount,
                  currency: item.currency,
                })),
              };
            },
          },
        ],
      };
    },
  };
}
