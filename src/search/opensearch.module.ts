// search/opensearch.module.ts
import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Client } from "@opensearch-project/opensearch";

export const OPENSEARCH_CLIENT = "OPENSEARCH_CLIENT";
export const PRODUCTS_INDEX = "PRODUCTS_INDEX";

/** "user:pass" -> credentials; only the first colon separates the two. */
export function parseBasicAuth(auth: string | undefined) {
  if (!auth) return undefined;
  const sep = auth.indexOf(":");
  return sep === -1
    ? { username: auth, password: "" }
    : { username: auth.slice(0, sep), password: auth.slice(sep + 1) };
}

@Module({
  providers: [
    {
      provide: OPENSEARCH_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => {
        const node = config.getOrThrow<string>("SEARCH_NODE"); // e.g. https://localhost:9200
        return new Client({
          node,
          auth: parseBasicAuth(config.get<string>("SEARCH_AUTH")),
          ssl: {
            rejectUnauthorized:
              config.get<string>("SEARCH_REJECT_UNAUTHORIZED") !== "false",
          },
          requestTimeout: 5000,
        });
      },
    },
    {
      provide: PRODUCTS_INDEX,
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        config.get<string>("SEARCH_PRODUCTS_INDEX") ?? "products",
    },
  ],
  exports: [OPENSEARCH_CLIENT, PRODUCTS_INDEX],
})
export class OpenSearchModule {}
