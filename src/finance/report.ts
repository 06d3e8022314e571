/**
 * Financial report and health assessment
 */

import { roundMoney } from '../utils/money.js';
import { endOfDay } from '../utils/dates.js';
import type { InventoryLookup } from '../inventory/lookup.js';
import type { LedgerStore } from '../ledger/types.js';
import type { FinancialGuard } from './guard.js';

export interface InventoryValuation {
  itemName: string;
  stock: number;
  unitPrice: number;
  value: number;
}

export interface TopSeller {
  itemName: string;
  totalUnits: number;
  totalRevenue: number;
}

export interface FinancialReport {
  asOf: string;
  cashBalance: number;
  inventoryValue: number;
  totalAssets: number;
  inventorySummary: InventoryValuation[];
  topSellingProducts: TopSeller[];
}

export type HealthStatus = 'EXCELLENT' | 'GOOD' | 'FAIR' | 'POOR';

export interface FinancialHealth {
  status: HealthStatus;
  cashToAssetsRatio: number;
  inventoryToAssetsRatio: number;
}

const TOP_SELLERS = 5;

export function generateFinancialReport(
  store: LedgerStore,
  lookup: InventoryLookup,
  guard: FinancialGuard,
  asOf: string
): FinancialReport {
  const cashBalance = guard.cashBalance(asOf);

  const inventorySummary = store.listItems().map((item) => {
    const stock = lookup.getStockLevel(item.name, asOf);
    return {
      itemName: item.name,
      stock,
      unitPrice: item.unitPrice,
      value: roundMoney(stock * item.unitPrice),
    };
  });
  const inventoryValue = roundMoney(inventorySummary.reduce((sum, row) => sum + row.value, 0));

  const sellers = new Map<string, TopSeller>();
  for (const sale of store.listTransactions({ type: 'sale', asOf })) {
    const row = sellers.get(sale.itemName) ?? { itemName: sale.itemName, totalUnits: 0, totalRevenue: 0 };
    row.totalUnits += sale.quantity;
    row.totalRevenue = roundMoney(row.totalRevenue + sale.total);
    sellers.set(sale.itemName, row);
  }

  const topSellingProducts = [...sellers.values()]
    .sort((a, b) => b.totalRevenue - a.totalRevenue || a.itemName.localeCompare(b.itemName))
    .slice(0, TOP_SELLERS);

  return {
    asOf: endOfDay(asOf),
    cashBalance,
    inventoryValue,
    totalAssets: roundMoney(cashBalance + inventoryValue),
    inventorySummary,
    topSellingProducts,
  };
}

/**
 * Grade liquidity by the share of assets held as cash
 */
export function assessFinancialHealth(report: FinancialReport): FinancialHealth {
  const { cashBalance, inventoryValue, totalAssets } = report;
  const cashRatio = totalAssets > 0 ? cashBalance / totalAssets : 0;
  const inventoryRatio = totalAssets > 0 ? inventoryValue / totalAssets : 0;

  let status: HealthStatus = 'POOR';
  if (cashRatio >= 0.3) status = 'EXCELLENT';
  else if (cashRatio >= 0.2) status = 'GOOD';
  else if (cashRatio >= 0.1) status = 'FAIR';

  return {
    status,
    cashToAssetsRatio: Math.round(cashRatio * 1000) / 1000,
    inventoryToAssetsRatio: Math.round(inventoryRatio * 1000) / 1000,
  };
}
