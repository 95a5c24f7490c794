// Names of the variables an economy records each step

export interface EconomyKeys {
  price: string;
  supply: string;
  fiatVolume: string;
  tokenVolume: string;
  holdingTime: string;
  effectiveHoldingTime: string;
  users: string;
}

export function economyKeys(token: string, fiat: string): EconomyKeys {
  return {
    price: `${token}_price`,
    supply: `${token}_supply`,
    fiatVolume: `transactions_${fiat}`,
    tokenVolume: `transactions_${token}`,
    holdingTime: 'holding_time',
    effectiveHoldingTime: 'effective_holding_time',
    users: 'num_users',
  };
}

export function poolKeys(poolName: string): { users: string; transactions: string } {
  return {
    users: `${poolName}_users`,
    transactions: `${poolName}_transactions`,
  };
}
