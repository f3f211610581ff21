import { z } from "zod";
import type { PriceFeed, PriceReading } from "../staking-engine/collaborators.js";

/** Fixed answer, settable by an operator or a test. */
export class StaticPriceFeed implements PriceFeed {
  constructor(
    private answer: bigint,
    private readonly decimals: number = 8,
    private readonly feedVersion: number = 1
  ) {}

  setAnswer(answer: bigint): void {
    this.answer = answer;
  }

  async latestPrice(): Promise<PriceReading> {
    return { answer: this.answer, decimals: this.decimals };
  }

  async version(): Promise<number> {
    return this.feedVersion;
  }
}

// CoinGecko simple-price shape: { "<id>": { "usd": 1234.56 } }
const simplePriceSchema = z.record(z.object({ usd: z.number().positive() }));

const HTTP_FEED_DECIMALS = 8;

/** Reads a USD quote from a CoinGecko-style simple-price endpoint. */
export class HttpPriceFeed implements PriceFeed {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async latestPrice(): Promise<PriceReading> {
    const response = await this.fetchImpl(this.url);
    if (!response.ok) {
      throw new Error(`Price API returned ${response.status}`);
    }

    const quotes = simplePriceSchema.parse(await response.json());
    const [first] = Object.values(quotes);
    if (!first) {
      throw new Error("Price API returned no quotes");
    }

    return {
      answer: BigInt(Math.round(first.usd * 10 ** HTTP_FEED_DECIMALS)),
      decimals: HTTP_FEED_DECIMALS,
    };
  }

  async version(): Promise<number> {
    return 1;
  }
}
