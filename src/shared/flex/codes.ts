/**
 * Flex Code Tables
 *
 * Closed sets of the short status/flag strings the brokerage writes into
 * Flex attributes. Each table is frozen at module load and shared by every
 * parse. Values outside a table never fail a parse: they are carried as the
 * `unrecognized` variant of {@link CodeValue}.
 *
 * @module shared/flex/codes
 */

import currencyCodes from './currencies.json';

// ============================================================================
// Code Value
// ============================================================================

/**
 * A coerced code: a known member of its table, or the raw text of a code
 * the table does not list (yet).
 */
export type CodeValue<K extends string = string> =
  | { readonly kind: 'known'; readonly code: K }
  | { readonly kind: 'unrecognized'; readonly raw: string };

export interface CodeTable<K extends string = string> {
  readonly name: string;
  readonly members: ReadonlySet<string>;
  has(value: string): value is K;
}

export function codeTable<K extends string>(name: string, members: readonly K[]): CodeTable<K> {
  const set: ReadonlySet<string> = new Set<string>(members);
  return Object.freeze({
    name,
    members: set,
    has: (value: string): value is K => set.has(value),
  });
}

export function knownCode<K extends string>(code: K): CodeValue<K> {
  return Object.freeze({ kind: 'known', code });
}

export function unrecognizedCode(raw: string): CodeValue<never> {
  return Object.freeze({ kind: 'unrecognized', raw });
}

/**
 * Returns the member for known codes and `undefined` for unrecognized ones
 */
export function codeOf<K extends string>(value: CodeValue<K> | null): K | undefined {
  return value?.kind === 'known' ? value.code : undefined;
}

/**
 * Raw text of a code value, whether the table knows it or not
 */
export function codeText(value: CodeValue): string {
  return value.kind === 'known' ? value.code : value.raw;
}

// ============================================================================
// Tables
// ============================================================================

export const CASH_ACTION_CODES = [
  'Deposits/Withdrawals',
  'Deposits & Withdrawals',
  'Broker Interest Paid',
  'Broker Interest Received',
  'Withholding Tax',
  'Bond Interest Received',
  'Bond Interest Paid',
  'Other Fees',
  'Dividends',
  'Payment In Lieu Of Dividends',
  'Commission Adjustments',
] as const;
export type CashAction = (typeof CASH_ACTION_CODES)[number];
export const CashActionTable = codeTable('CashAction', CASH_ACTION_CODES);

/** Used by both `code` and `notes` attributes */
export const NOTE_CODES = [
  'A',
  'AEx',
  'Adj',
  'Al',
  'Aw',
  'B',
  'Bo',
  'C',
  'CD',
  'CP',
  'Ca',
  'Co',
  'Cx',
  'D',
  'ETF',
  'Ep',
  'Ex',
  'G',
  'HC',
  'HFI',
  'HFR',
  'I',
  'IA',
  'INV',
  'L',
  'LD',
  'LI',
  'LT',
  'Lo',
  'M',
  'MEx',
  'ML',
  'MLG',
  'MLL',
  'MSG',
  'MSL',
  'O',
  'P',
  'PI',
  'Po',
  'Pr',
  'R',
  'RED',
  'Re',
  'Ri',
  'SI',
  'SL',
  'SO',
  'SS',
  'ST',
  'SY',
  'T',
] as const;
export type NoteCode = (typeof NOTE_CODES)[number];
export const NoteCodeTable = codeTable('NoteCode', NOTE_CODES);

export const ASSET_CLASS_CODES = [
  'CASH',
  'BILL',
  'BOND',
  'STK',
  'OPT',
  'WAR',
  'FUT',
  'FOP',
  'CFD',
] as const;
export type AssetClass = (typeof ASSET_CLASS_CODES)[number];
export const AssetClassTable = codeTable('AssetClass', ASSET_CLASS_CODES);

export const TRADE_TYPE_CODES = [
  'ExchTrade',
  'TradeCancel',
  'FracShare',
  'FracShareCancel',
  'TradeCorrect',
  'BookTrade',
  'DvpTrade',
] as const;
export type TradeType = (typeof TRADE_TYPE_CODES)[number];
export const TradeTypeTable = codeTable('TradeType', TRADE_TYPE_CODES);

export const BUY_SELL_CODES = ['BUY', 'BUY (Ca.)', 'SELL', 'SELL (Ca.)'] as const;
export type BuySell = (typeof BUY_SELL_CODES)[number];
export const BuySellTable = codeTable('BuySell', BUY_SELL_CODES);

export const OPEN_CLOSE_CODES = ['O', 'C', 'C;O'] as const;
export type OpenClose = (typeof OPEN_CLOSE_CODES)[number];
export const OpenCloseTable = codeTable('OpenClose', OPEN_CLOSE_CODES);

export const ORDER_TYPE_CODES = ['LMT', 'MKT', 'MOC'] as const;
export type OrderType = (typeof ORDER_TYPE_CODES)[number];
export const OrderTypeTable = codeTable('OrderType', ORDER_TYPE_CODES);

export const REORG_CODES = [
  'BC',
  'BM',
  'CA',
  'CC',
  'CD',
  'CH',
  'CI',
  'CO',
  'CP',
  'CS',
  'CT',
  'DI',
  'DW',
  'ED',
  'FA',
  'FI',
  'FS',
  'GV',
  'HD',
  'HI',
  'IC',
  'OR',
  'PI',
  'PV',
  'RI',
  'RS',
  'SD',
  'SO',
  'SR',
  'TC',
  'TI',
  'TO',
] as const;
export type Reorg = (typeof REORG_CODES)[number];
export const ReorgTable = codeTable('Reorg', REORG_CODES);

export const OPTION_ACTION_CODES = ['Assignment', 'Exercise', 'Expiration', 'Sell'] as const;
export type OptionAction = (typeof OPTION_ACTION_CODES)[number];
export const OptionActionTable = codeTable('OptionAction', OPTION_ACTION_CODES);

export const LONG_SHORT_CODES = ['Long', 'Short'] as const;
export type LongShort = (typeof LONG_SHORT_CODES)[number];
export const LongShortTable = codeTable('LongShort', LONG_SHORT_CODES);

export const TO_FROM_CODES = ['To', 'From'] as const;
export type ToFrom = (typeof TO_FROM_CODES)[number];
export const ToFromTable = codeTable('ToFrom', TO_FROM_CODES);

export const TRANSFER_TYPE_CODES = ['INTERNAL', 'ACATS'] as const;
export type TransferType = (typeof TRANSFER_TYPE_CODES)[number];
export const TransferTypeTable = codeTable('TransferType', TRANSFER_TYPE_CODES);

export const IN_OUT_CODES = ['IN', 'OUT'] as const;
export type InOut = (typeof IN_OUT_CODES)[number];
export const InOutTable = codeTable('InOut', IN_OUT_CODES);

export const DELIVERED_RECEIVED_CODES = ['Delivered', 'Received'] as const;
export type DeliveredReceived = (typeof DELIVERED_RECEIVED_CODES)[number];
export const DeliveredReceivedTable = codeTable('DeliveredReceived', DELIVERED_RECEIVED_CODES);

export const PUT_CALL_CODES = ['P', 'C'] as const;
export type PutCall = (typeof PUT_CALL_CODES)[number];
export const PutCallTable = codeTable('PutCall', PUT_CALL_CODES);

export const LEVEL_OF_DETAIL_CODES = [
  'EXECUTION',
  'ORDER',
  'CLOSED_LOT',
  'TRADE_TRANSFERS',
  'SYMBOL_SUMMARY',
  'LOT',
  'SUMMARY',
  'BaseCurrency',
  'Currency',
] as const;
export type LevelOfDetail = (typeof LEVEL_OF_DETAIL_CODES)[number];
export const LevelOfDetailTable = codeTable('LevelOfDetail', LEVEL_OF_DETAIL_CODES);

export const SLB_TYPE_CODES = ['DirectBorrow', 'DirectLoan', 'ManagedLoan'] as const;
export type SlbType = (typeof SLB_TYPE_CODES)[number];
export const SlbTypeTable = codeTable('SlbType', SLB_TYPE_CODES);

export const ACCOUNT_TYPE_CODES = [
  'Individual',
  'Institution Master',
  'Institution Client',
  'Advisor Master',
  'Advisor Master Consolidated',
  'Advisor Client',
  'Broker Master',
  'Broker Master Consolidated',
  'Broker Client',
  'Fund Advisor',
] as const;
export type AccountType = (typeof ACCOUNT_TYPE_CODES)[number];
export const AccountTypeTable = codeTable('AccountType', ACCOUNT_TYPE_CODES);

export const CUSTOMER_TYPE_CODES = [
  'Individual',
  'Joint',
  'Trust',
  'IRA',
  'Corporate',
  'Partnership',
  'Limited Liability Corporation',
  'Unincorporated Business',
  'IRA Traditional Rollover',
  'IRA Traditional New',
  'IRA Traditional Inherited',
  'IRA Roth New',
  'IRA Roth Inherited',
  'IRA SEP New',
  'IRA SEP Inherited',
] as const;
export type CustomerType = (typeof CUSTOMER_TYPE_CODES)[number];
export const CustomerTypeTable = codeTable('CustomerType', CUSTOMER_TYPE_CODES);

export const ACCOUNT_CAPABILITY_CODES = ['Cash', 'Margin', 'Portfolio Margin', 'IBPrime'] as const;
export type AccountCapability = (typeof ACCOUNT_CAPABILITY_CODES)[number];
export const AccountCapabilityTable = codeTable('AccountCapability', ACCOUNT_CAPABILITY_CODES);

export const TRADING_PERMISSION_CODES = [
  'Stocks',
  'Options',
  'Mutual Funds',
  'Futures',
  'Forex',
  'Bonds',
  'CFDs',
  'IBG Notes',
  'Warrants',
  'US Treasury Bills',
  'Futures Options',
  'SSF',
  'Stock Loan',
  'Stock Borrow',
] as const;
export type TradingPermission = (typeof TRADING_PERMISSION_CODES)[number];
export const TradingPermissionTable = codeTable('TradingPermission', TRADING_PERMISSION_CODES);

export const ENTITY_CODES = ['IBLLC-US', 'IB-UK', 'IB-UKL', 'IB-CAN', 'IB-JP', 'IB-IN'] as const;
export type EntityCode = (typeof ENTITY_CODES)[number];
export const EntityTable = codeTable('Entity', ENTITY_CODES);

/** ISO 4217 plus the vendor's `CNH` and `BASE_SUMMARY` pseudo-currencies */
export const CurrencyTable = codeTable<string>('Currency', currencyCodes);
