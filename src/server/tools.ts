// ============================================================================
// TOOL DEFINITIONS
//
// Standard MCP tool definitions with:
// - inputSchema: JSON Schema for tool arguments
// - outputSchema: JSON Schema for the structuredContent of a successful call
// ============================================================================

const marketSchema = {
  type: "object",
  properties: {
    id: { type: "string" },
    conditionId: { type: "string" },
    question: { type: "string" },
    marketSlug: { type: "string" },
    endDate: { type: "string" },
    active: { type: "boolean" },
    closed: { type: "boolean" },
    archived: { type: "boolean" },
    acceptingOrders: { type: "boolean" },
    liquidity: { type: "number" },
    outcomes: { type: "array", items: { type: "string" } },
    outcomePrices: { type: "array", items: { type: "number" } },
    clobTokenIds: { type: "array", items: { type: "string" } },
    rewardsMinSize: { type: "number" },
    rewardsMaxSpread: { type: "number" },
  },
  required: ["id", "conditionId", "outcomes", "outcomePrices", "clobTokenIds"],
};

const marketListSchema = {
  type: "object" as const,
  properties: {
    markets: { type: "array", items: marketSchema },
    count: { type: "number" },
    skipped: { type: "number", description: "Upstream rows dropped because they failed validation" },
  },
  required: ["markets", "count"],
};

const eventListSchema = {
  type: "object" as const,
  properties: {
    events: {
      type: "array",
      items: {
        type: "object",
        properties: {
          id: { type: "string" },
          slug: { type: "string" },
          title: { type: "string" },
          tags: { type: "array", items: { type: "string" } },
          markets: { type: "array", items: marketSchema },
        },
        required: ["id", "markets"],
      },
    },
    count: { type: "number" },
    skipped: { type: "number" },
  },
  required: ["events", "count"],
};

const passthroughSchema = (key: string, description: string) => ({
  type: "object" as const,
  properties: {
    user: { type: "string", description: "Wallet address queried" },
    [key]: { description },
  },
  required: ["user", key],
});

const userProperty = {
  type: "string",
  description: "Wallet address. Defaults to the server's own wallet.",
};

const limitProperty = (description: string) => ({
  type: "integer",
  minimum: 1,
  description,
});

const tokenIdProperty = {
  type: "string",
  description: "CLOB token id of one market outcome",
};

const sideProperty = {
  type: "string",
  enum: ["BUY", "SELL"],
};

const eventFilterProperties = {
  active: { type: "boolean", description: "Only active events" },
  closed: { type: "boolean", description: "Filter on the closed flag" },
  archived: { type: "boolean", description: "Filter on the archived flag" },
  limit: limitProperty("Page size requested from the metadata API"),
  offset: { type: "integer", minimum: 0, description: "Row offset for pagination" },
};

export const TOOLS = [
  // ==================== MARKETS ====================

  {
    name: "get_market",
    description: "Look up markets by their exact slug.",
    inputSchema: {
      type: "object" as const,
      properties: {
        slug: { type: "string", description: "Market slug, e.g. 'will-it-rain-tomorrow'" },
      },
      required: ["slug"],
    },
    outputSchema: marketListSchema,
  },

  {
    name: "get_markets",
    description:
      "List current markets (active, not closed, not archived) from the metadata API. Without a limit every page is read.",
    inputSchema: {
      type: "object" as const,
      properties: {
        limit: limitProperty("Fetch a single page of this many markets"),
        active_only: {
          type: "boolean",
          description: "Keep only markets accepting orders whose end date has not passed",
        },
      },
      required: [],
    },
    outputSchema: marketListSchema,
  },

  {
    name: "list_all_markets",
    description:
      "Walk the venue's full market listing page by page. Slow: reads every page before returning.",
    inputSchema: {
      type: "object" as const,
      properties: {
        live_only: { type: "boolean", description: "Keep only markets tradeable now" },
        limit: limitProperty("Return at most this many markets"),
      },
      required: [],
    },
    outputSchema: {
      ...marketListSchema,
      properties: {
        ...marketListSchema.properties,
        pages: { type: "number", description: "Upstream pages read" },
      },
    },
  },

  {
    name: "search_markets",
    description: "Case-insensitive text search over market questions across the venue's full listing.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Text to find in the market question" },
        limit: limitProperty("Return at most this many matches"),
        live_only: { type: "boolean", description: "Search only markets tradeable now" },
      },
      required: ["query"],
    },
    outputSchema: marketListSchema,
  },

  // ==================== EVENTS ====================

  {
    name: "get_events",
    description: "List events with their nested markets from the metadata API.",
    inputSchema: {
      type: "object" as const,
      properties: {
        ...eventFilterProperties,
        slug: { type: "string", description: "Exact event slug" },
      },
      required: [],
    },
    outputSchema: eventListSchema,
  },

  {
    name: "search_events",
    description: "Case-insensitive text search over event titles.",
    inputSchema: {
      type: "object" as const,
      properties: {
        query: { type: "string", description: "Text to find in the event title" },
        ...eventFilterProperties,
        limit: limitProperty("Return at most this many matches"),
        page_size: limitProperty("Page size requested from the metadata API"),
      },
      required: ["query"],
    },
    outputSchema: eventListSchema,
  },

  // ==================== ORDER BOOK ====================

  {
    name: "get_order_book",
    description: "Current order book for one outcome token, levels exactly as the venue reports them.",
    inputSchema: {
      type: "object" as const,
      properties: { token_id: tokenIdProperty },
      required: ["token_id"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        token_id: { type: "string" },
        market: { type: "string" },
        timestamp: { type: "string" },
        bids: { type: "array", items: { type: "object" } },
        asks: { type: "array", items: { type: "object" } },
      },
      required: ["token_id", "bids", "asks"],
    },
  },

  {
    name: "get_mid_price",
    description:
      "Mid price between best bid and best ask, rounded to 4 decimals. null when a side is empty or a price is malformed.",
    inputSchema: {
      type: "object" as const,
      properties: { token_id: tokenIdProperty },
      required: ["token_id"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        token_id: { type: "string" },
        mid_price: { type: ["number", "null"] },
        status: { type: "string", enum: ["ok", "empty_bids", "empty_asks", "malformed_bids", "malformed_asks"] },
        best_bid: { type: "number" },
        best_ask: { type: "number" },
      },
      required: ["token_id", "mid_price", "status"],
    },
  },

  {
    name: "get_price",
    description: "Venue spot price for buying or selling an outcome token.",
    inputSchema: {
      type: "object" as const,
      properties: { token_id: tokenIdProperty, side: sideProperty },
      required: ["token_id", "side"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        token_id: { type: "string" },
        side: { type: "string" },
        price: { type: "number" },
      },
      required: ["token_id", "side", "price"],
    },
  },

  // ==================== TRADING ====================

  {
    name: "place_limit_order",
    description: "Sign and post a good-till-cancelled limit order. Price and size are checked by the venue only.",
    inputSchema: {
      type: "object" as const,
      properties: {
        token_id: tokenIdProperty,
        price: { type: "number", description: "Limit price per share" },
        size: { type: "number", description: "Number of shares" },
        side: sideProperty,
      },
      required: ["token_id", "price", "size", "side"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        order_id: { type: ["string", "null"] },
        response: {},
      },
      required: ["order_id"],
    },
  },

  {
    name: "place_market_order",
    description:
      "Sign and post a market order for an amount in USDC. order_type accepts FOK, IOC/FAK or GTC; anything else is sent as FOK.",
    inputSchema: {
      type: "object" as const,
      properties: {
        token_id: tokenIdProperty,
        amount: { type: "number", description: "Notional amount in USDC" },
        order_type: { type: "string", description: "Fulfillment policy (default FOK)" },
        side: { ...sideProperty, description: "Defaults to BUY" },
      },
      required: ["token_id", "amount"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        order_type: { type: "string", enum: ["FOK", "FAK", "GTC"] },
        response: {},
      },
      required: ["order_type"],
    },
  },

  {
    name: "cancel_order",
    description: "Cancel one open order by id.",
    inputSchema: {
      type: "object" as const,
      properties: {
        order_id: { type: "string", description: "Venue order id" },
      },
      required: ["order_id"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        order_id: { type: "string" },
        response: {},
      },
      required: ["order_id"],
    },
  },

  // ==================== ACCOUNT ====================

  {
    name: "get_usdc_balance",
    description: "On-chain USDC balance of a wallet.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty },
      required: [],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        user: { type: "string" },
        balance: { type: "number" },
      },
      required: ["user", "balance"],
    },
  },

  {
    name: "get_portfolio_value",
    description: "Aggregated value of a wallet's positions.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty },
      required: [],
    },
    outputSchema: passthroughSchema("value", "Value as reported by the data API"),
  },

  {
    name: "get_positions",
    description: "Open positions of a wallet.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty, limit: limitProperty("Maximum number of positions") },
      required: [],
    },
    outputSchema: passthroughSchema("positions", "Positions as reported by the data API"),
  },

  {
    name: "get_closed_positions",
    description: "Resolved positions of a wallet with realized PnL.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty, limit: limitProperty("Maximum number of positions") },
      required: [],
    },
    outputSchema: passthroughSchema("positions", "Closed positions as reported by the data API"),
  },

  {
    name: "get_trades",
    description: "Trade history of a wallet.",
    inputSchema: {
      type: "object" as const,
      properties: { user: userProperty, limit: limitProperty("Maximum number of trades") },
      required: [],
    },
    outputSchema: passthroughSchema("trades", "Trades as reported by the data API"),
  },

  {
    name: "redeem_position",
    description:
      "Redeem resolved outcome tokens for USDC. Returns the transaction hash once submitted; the transaction is not awaited.",
    inputSchema: {
      type: "object" as const,
      properties: {
        condition_id: { type: "string", description: "Market condition id (0x-prefixed, 32 bytes)" },
        index_sets: {
          type: "array",
          items: { type: "integer", minimum: 1 },
          description: "Outcome index sets to redeem, e.g. [1, 2] for both sides of a binary market",
        },
      },
      required: ["condition_id", "index_sets"],
    },
    outputSchema: {
      type: "object" as const,
      properties: {
        condition_id: { type: "string" },
        tx_hash: { type: "string" },
      },
      required: ["condition_id", "tx_hash"],
    },
  },
];
