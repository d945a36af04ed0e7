/**
 * Flex Record Declarations
 *
 * Every statement section the parser understands, declared as data. Adding
 * a section or a field is an edit to this file only.
 *
 * @module shared/flex/records
 */

import {
  AccountCapabilityTable,
  AccountTypeTable,
  AssetClassTable,
  BuySellTable,
  CashActionTable,
  CurrencyTable,
  CustomerTypeTable,
  DeliveredReceivedTable,
  EntityTable,
  InOutTable,
  LevelOfDetailTable,
  LongShortTable,
  NoteCodeTable,
  OpenCloseTable,
  OptionActionTable,
  OrderTypeTable,
  PutCallTable,
  ReorgTable,
  SlbTypeTable,
  ToFromTable,
  TradeTypeTable,
  TradingPermissionTable,
  TransferTypeTable,
} from './codes';
import {
  boolean,
  code,
  codes,
  container,
  date,
  dateTime,
  decimal,
  decimals,
  decimalVariants,
  many,
  one,
  record,
  required,
  text,
  time,
  type EntryMap,
  type RecordOf,
} from './schema';

/** `notes` and `code` attributes separate flags with semicolons */
const noteCodes = () => codes(NoteCodeTable, ';');

// ============================================================================
// Shared Field Groups
// ============================================================================

const accountFields = {
  accountId: required(text()),
  acctAlias: text(),
  model: text(),
};

const currencyFields = {
  currency: code(CurrencyTable),
  fxRateToBase: decimal(),
};

const securityFields = {
  assetCategory: code(AssetClassTable),
  symbol: text(),
  description: text(),
  conid: text(),
  securityID: text(),
  securityIDType: text(),
  cusip: text(),
  isin: text(),
  underlyingConid: text(),
  underlyingSymbol: text(),
  issuer: text(),
  multiplier: decimal(),
  strike: decimal(),
  expiry: date(),
  putCall: code(PutCallTable),
  principalAdjustFactor: decimal(),
};

const tradeFields = {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  tradeID: text(),
  reportDate: date(),
  tradeDate: date(),
  tradeTime: time(),
  settleDateTarget: date(),
  transactionType: code(TradeTypeTable),
  exchange: text(),
  quantity: decimal(),
  tradePrice: decimal(),
  tradeMoney: decimal(),
  proceeds: decimal(),
  taxes: decimal(),
  ibCommission: decimal(),
  ibCommissionCurrency: code(CurrencyTable),
  netCash: decimal(),
  closePrice: decimal(),
  openCloseIndicator: code(OpenCloseTable),
  notes: noteCodes(),
  cost: decimal(),
  fifoPnlRealized: decimal(),
  fxPnl: decimal(),
  mtmPnl: decimal(),
  origTradePrice: decimal(),
  origTradeDate: date(),
  origTradeID: text(),
  origOrderID: text(),
  clearingFirmID: text(),
  transactionID: text(),
  openDateTime: dateTime(),
  holdingPeriodDateTime: dateTime(),
  whenRealized: dateTime(),
  whenReopened: dateTime(),
  levelOfDetail: code(LevelOfDetailTable),
};

const orderFields = {
  ibOrderID: text(),
  ibExecID: text(),
  brokerageOrderID: text(),
  orderReference: text(),
  volatilityOrderLink: text(),
  exchOrderId: text(),
  extExecID: text(),
  // Holds a date and a time despite the name
  orderTime: dateTime(),
  changeInPrice: decimal(),
  changeInQuantity: decimal(),
  orderType: code(OrderTypeTable),
  traderID: text(),
  isAPIOrder: boolean(),
};

const dividendAccrualFields = {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  exDate: date(),
  payDate: date(),
  quantity: decimal(),
  tax: decimal(),
  fee: decimal(),
  grossRate: decimal(),
  grossAmount: decimal(),
  netAmount: decimal(),
  code: noteCodes(),
  fromAcct: text(),
  toAcct: text(),
};

const CASH_REPORT_PERIODS = ['Sec', 'Com', 'MTD', 'YTD'] as const;
const CASH_REPORT_SEGMENTS = ['Sec', 'Com'] as const;

const EQUITY_SIDES = ['Long', 'Short'] as const;

// ============================================================================
// Account Level Records
// ============================================================================

export const AccountInformationSchema = record('AccountInformation', {
  accountId: required(text()),
  acctAlias: text(),
  currency: code(CurrencyTable),
  name: text(),
  accountType: code(AccountTypeTable),
  customerType: code(CustomerTypeTable),
  accountCapabilities: codes(AccountCapabilityTable),
  tradingPermissions: codes(TradingPermissionTable),
  dateOpened: date(),
  dateFunded: date(),
  dateClosed: date(),
  masterName: text(),
  ibEntity: code(EntityTable),
});

export const ChangeInNAVSchema = record('ChangeInNAV', {
  ...accountFields,
  fromDate: date(),
  toDate: date(),
  ...decimals(
    'startingValue',
    'mtm',
    'realized',
    'changeInUnrealized',
    'costAdjustments',
    'transferredPnlAdjustments',
    'depositsWithdrawals',
    'internalCashTransfers',
    'assetTransfers',
    'debitCardActivity',
    'billPay',
    'dividends',
    'withholdingTax',
    'withholding871m',
    'withholdingTaxCollected',
    'changeInDividendAccruals',
    'interest',
    'changeInInterestAccruals',
    'advisorFees',
    'clientFees',
    'otherFees',
    'feesReceivables',
    'commissions',
    'commissionReceivables',
    'forexCommissions',
    'transactionTax',
    'taxReceivables',
    'salesTax',
    'softDollars',
    'netFxTrading',
    'fxTranslation',
    'linkingAdjustments',
    'other',
    'endingValue',
    'twr',
    'corporateActionProceeds'
  ),
});

// ============================================================================
// Performance and Cash Summaries
// ============================================================================

export const MTMPerformanceSummaryUnderlyingSchema = record('MTMPerformanceSummaryUnderlying', {
  ...accountFields,
  ...securityFields,
  listingExchange: text(),
  underlyingSecurityID: text(),
  underlyingListingExchange: text(),
  reportDate: date(),
  ...decimals(
    'prevCloseQuantity',
    'prevClosePrice',
    'closeQuantity',
    'closePrice',
    'transactionMtm',
    'priorOpenMtm',
    'commissions',
    'other',
    'total'
  ),
  code: noteCodes(),
});

export const EquitySummaryByReportDateInBaseSchema = record('EquitySummaryByReportDateInBase', {
  ...accountFields,
  reportDate: date(),
  ...decimalVariants('cash', EQUITY_SIDES),
  ...decimalVariants('slbCashCollateral', EQUITY_SIDES),
  ...decimalVariants('stock', EQUITY_SIDES),
  ...decimalVariants('slbDirectSecuritiesBorrowed', EQUITY_SIDES),
  ...decimalVariants('slbDirectSecuritiesLent', EQUITY_SIDES),
  ...decimalVariants('options', EQUITY_SIDES),
  ...decimalVariants('commodities', EQUITY_SIDES),
  ...decimalVariants('bonds', EQUITY_SIDES),
  ...decimalVariants('notes', EQUITY_SIDES),
  ...decimalVariants('funds', EQUITY_SIDES),
  ...decimalVariants('interestAccruals', EQUITY_SIDES),
  ...decimalVariants('softDollars', EQUITY_SIDES),
  ...decimalVariants('forexCfdUnrealizedPl', EQUITY_SIDES),
  ...decimalVariants('dividendAccruals', EQUITY_SIDES),
  ...decimalVariants('fdicInsuredBankSweepAccount', EQUITY_SIDES),
  ...decimalVariants('fdicInsuredBankSweepAccountCashComponent', EQUITY_SIDES),
  ...decimalVariants('fdicInsuredAccountInterestAccruals', EQUITY_SIDES),
  ...decimalVariants('fdicInsuredAccountInterestAccrualsComponent', EQUITY_SIDES),
  ...decimalVariants('total', EQUITY_SIDES),
  ...decimals('brokerInterestAccrualsComponent', 'brokerCashComponent', 'cfdUnrealizedPl'),
});

export const CashReportCurrencySchema = record('CashReportCurrency', {
  ...accountFields,
  currency: code(CurrencyTable),
  fromDate: date(),
  toDate: date(),
  ...decimalVariants('startingCash', CASH_REPORT_SEGMENTS),
  ...decimalVariants('clientFees', CASH_REPORT_PERIODS),
  ...decimalVariants('commissions', CASH_REPORT_PERIODS),
  ...decimalVariants('billableCommissions', CASH_REPORT_PERIODS),
  ...decimalVariants('depositWithdrawals', CASH_REPORT_PERIODS),
  ...decimalVariants('deposits', CASH_REPORT_PERIODS),
  ...decimalVariants('withdrawals', CASH_REPORT_PERIODS),
  ...decimalVariants('accountTransfers', CASH_REPORT_PERIODS),
  ...decimalVariants('linkingAdjustments', CASH_REPORT_SEGMENTS),
  ...decimalVariants('internalTransfers', CASH_REPORT_PERIODS),
  ...decimalVariants('dividends', CASH_REPORT_PERIODS),
  ...decimalVariants('insuredDepositInterest', CASH_REPORT_PERIODS),
  ...decimalVariants('brokerInterest', CASH_REPORT_PERIODS),
  ...decimalVariants('bondInterest', CASH_REPORT_PERIODS),
  ...decimalVariants('cashSettlingMtm', CASH_REPORT_PERIODS),
  ...decimalVariants('realizedVm', CASH_REPORT_PERIODS),
  ...decimalVariants('cfdCharges', CASH_REPORT_PERIODS),
  ...decimalVariants('netTradesSales', CASH_REPORT_PERIODS),
  ...decimalVariants('netTradesPurchases', CASH_REPORT_PERIODS),
  ...decimalVariants('advisorFees', CASH_REPORT_PERIODS),
  ...decimalVariants('feesReceivables', CASH_REPORT_PERIODS),
  ...decimalVariants('paymentInLieu', CASH_REPORT_PERIODS),
  ...decimalVariants('transactionTax', CASH_REPORT_PERIODS),
  ...decimalVariants('taxReceivables', CASH_REPORT_PERIODS),
  ...decimalVariants('withholdingTax', CASH_REPORT_PERIODS),
  ...decimalVariants('withholding871m', CASH_REPORT_PERIODS),
  ...decimalVariants('withholdingCollectedTax', CASH_REPORT_PERIODS),
  ...decimalVariants('salesTax', CASH_REPORT_PERIODS),
  ...decimalVariants('fxTranslationGainLoss', CASH_REPORT_SEGMENTS),
  ...decimalVariants('otherFees', CASH_REPORT_PERIODS),
  ...decimalVariants('other', CASH_REPORT_SEGMENTS),
  ...decimalVariants('endingCash', CASH_REPORT_SEGMENTS),
  ...decimalVariants('endingSettledCash', CASH_REPORT_SEGMENTS),
});

export const StatementOfFundsLineSchema = record('StatementOfFundsLine', {
  ...accountFields,
  ...securityFields,
  currency: code(CurrencyTable),
  reportDate: date(),
  date: date(),
  activityDescription: text(),
  tradeID: text(),
  ...decimals('debit', 'credit', 'amount', 'balance'),
  buySell: code(BuySellTable),
});

export const ChangeInPositionValueSchema = record('ChangeInPositionValue', {
  ...accountFields,
  currency: code(CurrencyTable),
  assetCategory: code(AssetClassTable),
  ...decimals(
    'priorPeriodValue',
    'transactions',
    'mtmPriorPeriodPositions',
    'mtmTransactions',
    'corporateActions',
    'other',
    'accountTransfers',
    'linkingAdjustments',
    'fxTranslationPnl',
    'futurePriceAdjustments',
    'settledCash',
    'endOfPeriodValue'
  ),
});

// ============================================================================
// Positions
// ============================================================================

export const OpenPositionSchema = record('OpenPosition', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  reportDate: date(),
  ...decimals(
    'position',
    'markPrice',
    'positionValue',
    'openPrice',
    'costBasisPrice',
    'costBasisMoney',
    'percentOfNAV',
    'fifoPnlUnrealized'
  ),
  side: code(LongShortTable),
  levelOfDetail: code(LevelOfDetailTable),
  openDateTime: dateTime(),
  holdingPeriodDateTime: dateTime(),
  code: noteCodes(),
  originatingOrderID: text(),
  originatingTransactionID: text(),
  accruedInt: decimal(),
});

export const FxLotSchema = record('FxLot', {
  ...accountFields,
  assetCategory: code(AssetClassTable),
  reportDate: date(),
  functionalCurrency: code(CurrencyTable),
  fxCurrency: code(CurrencyTable),
  ...decimals('quantity', 'costPrice', 'costBasis', 'closePrice', 'value', 'unrealizedPL'),
  code: noteCodes(),
  lotDescription: text(),
  lotOpenDateTime: dateTime(),
  levelOfDetail: code(LevelOfDetailTable),
});

export const PriorPeriodPositionSchema = record('PriorPeriodPosition', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  priorMtmPnl: decimal(),
  date: date(),
  price: decimal(),
});

// ============================================================================
// Trading Activity
// ============================================================================

export const TradeSchema = record('Trade', {
  ...tradeFields,
  ...orderFields,
  buySell: code(BuySellTable),
});

export const TradeConfirmationSchema = record('TradeConfirmation', {
  ...tradeFields,
  ...orderFields,
  buySell: code(BuySellTable),
  commissionCurrency: code(CurrencyTable),
  price: decimal(),
  orderID: text(),
  execID: text(),
  allocatedTo: text(),
  dateTime: dateTime(),
  ...decimals(
    'thirdPartyClearingCommission',
    'thirdPartyRegulatoryCommission',
    'thirdPartyExecutionCommission',
    'brokerExecutionCommission',
    'brokerClearingCommission',
    'otherCommission',
    'commission',
    'amount',
    'tax'
  ),
  code: noteCodes(),
  listingExchange: text(),
  underlyingListingExchange: text(),
  settleDate: date(),
  underlyingSecurityID: text(),
});

export const OptionEAESchema = record('OptionEAE', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  date: date(),
  transactionType: code(OptionActionTable),
  ...decimals(
    'quantity',
    'tradePrice',
    'markPrice',
    'proceeds',
    'commisionsAndTax',
    'costBasis',
    'realizedPnl',
    'fxPnl',
    'mtmPnl'
  ),
  tradeID: text(),
});

export const TradeTransferSchema = record('TradeTransfer', {
  ...tradeFields,
  brokerName: text(),
  brokerAccount: text(),
  awayBrokerCommission: decimal(),
  regulatoryFee: decimal(),
  direction: code(ToFromTable),
  deliveredReceived: code(DeliveredReceivedTable),
  ...decimals('netTradeMoney', 'netTradeMoneyInBase', 'netTradePrice'),
});

// ============================================================================
// Accruals, Lending and Transfers
// ============================================================================

export const InterestAccrualsCurrencySchema = record('InterestAccrualsCurrency', {
  ...accountFields,
  currency: code(CurrencyTable),
  fromDate: date(),
  toDate: date(),
  ...decimals(
    'startingAccrualBalance',
    'interestAccrued',
    'accrualReversal',
    'fxTranslation',
    'endingAccrualBalance'
  ),
});

export const SLBActivitySchema = record('SLBActivity', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  date: date(),
  slbTransactionId: text(),
  activityDescription: text(),
  type: code(SlbTypeTable),
  exchange: text(),
  ...decimals(
    'quantity',
    'feeRate',
    'collateralAmount',
    'markQuantity',
    'markPriorPrice',
    'markCurrentPrice'
  ),
});

export const TransferSchema = record('Transfer', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  date: date(),
  type: code(TransferTypeTable),
  direction: code(InOutTable),
  company: text(),
  account: text(),
  accountName: text(),
  ...decimals(
    'quantity',
    'transferPrice',
    'positionAmount',
    'positionAmountInBase',
    'pnlAmount',
    'pnlAmountInBase',
    'fxPnl',
    'cashTransfer'
  ),
  code: noteCodes(),
  clientReference: text(),
});

export const ChangeInDividendAccrualSchema = record('ChangeInDividendAccrual', {
  ...dividendAccrualFields,
  date: date(),
});

export const OpenDividendAccrualSchema = record('OpenDividendAccrual', dividendAccrualFields);

// ============================================================================
// Corporate Actions and Cash
// ============================================================================

export const CorporateActionSchema = record('CorporateAction', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  reportDate: date(),
  dateTime: dateTime(),
  ...decimals('amount', 'proceeds', 'value', 'quantity', 'fifoPnlRealized', 'mtmPnl'),
  code: noteCodes(),
  type: code(ReorgTable),
});

export const CashTransactionSchema = record('CashTransaction', {
  ...accountFields,
  ...currencyFields,
  ...securityFields,
  // Holds only a date despite the name
  dateTime: date(),
  amount: decimal(),
  type: code(CashActionTable),
  tradeID: text(),
  code: noteCodes(),
  transactionID: text(),
  reportDate: date(),
  clientReference: text(),
});

// ============================================================================
// Reference Data
// ============================================================================

export const SecurityInfoSchema = record('SecurityInfo', {
  ...securityFields,
  maturity: text(),
  issueDate: date(),
  code: noteCodes(),
  type: text(),
});

export const ConversionRateSchema = record('ConversionRate', {
  reportDate: required(date()),
  fromCurrency: required(code(CurrencyTable)),
  toCurrency: required(code(CurrencyTable)),
  rate: required(decimal()),
});

// ============================================================================
// Statement and Response
// ============================================================================

const section = <N extends string, E extends EntryMap>(name: N, entries: E) =>
  many(container(name, entries));

export const FlexStatementSchema = record(
  'FlexStatement',
  {
    accountId: required(text()),
    fromDate: required(date()),
    toDate: required(date()),
    period: required(text()),
    whenGenerated: required(dateTime()),
  },
  {
    AccountInformation: one(AccountInformationSchema),
    ChangeInNAV: one(ChangeInNAVSchema),
    MTMPerformanceSummaryInBase: section('MTMPerformanceSummaryInBase', {
      MTMPerformanceSummaryUnderlying: MTMPerformanceSummaryUnderlyingSchema,
    }),
    EquitySummaryInBase: section('EquitySummaryInBase', {
      EquitySummaryByReportDateInBase: EquitySummaryByReportDateInBaseSchema,
    }),
    CashReport: section('CashReport', { CashReportCurrency: CashReportCurrencySchema }),
    StmtFunds: section('StmtFunds', { StatementOfFundsLine: StatementOfFundsLineSchema }),
    ChangeInPositionValues: section('ChangeInPositionValues', {
      ChangeInPositionValue: ChangeInPositionValueSchema,
    }),
    OpenPositions: section('OpenPositions', { OpenPosition: OpenPositionSchema }),
    FxPositions: section('FxPositions', {
      FxLots: container('FxLots', { FxLot: FxLotSchema }),
    }),
    Trades: section('Trades', { Trade: TradeSchema }),
    TradeConfirms: section('TradeConfirms', { TradeConfirmation: TradeConfirmationSchema }),
    OptionEAE: section('OptionEAE', { OptionEAE: OptionEAESchema }),
    TradeTransfers: section('TradeTransfers', { TradeTransfer: TradeTransferSchema }),
    PriorPeriodPositions: section('PriorPeriodPositions', {
      PriorPeriodPosition: PriorPeriodPositionSchema,
    }),
    CorporateActions: section('CorporateActions', { CorporateAction: CorporateActionSchema }),
    CashTransactions: section('CashTransactions', { CashTransaction: CashTransactionSchema }),
    InterestAccruals: section('InterestAccruals', {
      InterestAccrualsCurrency: InterestAccrualsCurrencySchema,
    }),
    SLBActivities: section('SLBActivities', { SLBActivity: SLBActivitySchema }),
    Transfers: section('Transfers', { Transfer: TransferSchema }),
    ChangeInDividendAccruals: section('ChangeInDividendAccruals', {
      ChangeInDividendAccrual: ChangeInDividendAccrualSchema,
    }),
    OpenDividendAccruals: section('OpenDividendAccruals', {
      OpenDividendAccrual: OpenDividendAccrualSchema,
    }),
    SecuritiesInfo: section('SecuritiesInfo', { SecurityInfo: SecurityInfoSchema }),
    ConversionRates: section('ConversionRates', { ConversionRate: ConversionRateSchema }),
  }
);

export const FlexQueryResponseSchema = record(
  'FlexQueryResponse',
  {
    queryName: required(text()),
    type: text(),
  },
  {
    FlexStatements: many(
      container('FlexStatements', { FlexStatement: FlexStatementSchema }, { countAttribute: 'count' })
    ),
  }
);

// ============================================================================
// Record Types
// ============================================================================

export type FlexQueryResponse = RecordOf<typeof FlexQueryResponseSchema>;
export type FlexStatement = RecordOf<typeof FlexStatementSchema>;
export type AccountInformation = RecordOf<typeof AccountInformationSchema>;
export type ChangeInNAV = RecordOf<typeof ChangeInNAVSchema>;
export type MTMPerformanceSummaryUnderlying = RecordOf<typeof MTMPerformanceSummaryUnderlyingSchema>;
export type EquitySummaryByReportDateInBase = RecordOf<typeof EquitySummaryByReportDateInBaseSchema>;
export type CashReportCurrency = RecordOf<typeof CashReportCurrencySchema>;
export type StatementOfFundsLine = RecordOf<typeof StatementOfFundsLineSchema>;
export type ChangeInPositionValue = RecordOf<typeof ChangeInPositionValueSchema>;
export type OpenPosition = RecordOf<typeof OpenPositionSchema>;
export type FxLot = RecordOf<typeof FxLotSchema>;
export type Trade = RecordOf<typeof TradeSchema>;
export type TradeConfirmation = RecordOf<typeof TradeConfirmationSchema>;
export type OptionEAE = RecordOf<typeof OptionEAESchema>;
export type TradeTransfer = RecordOf<typeof TradeTransferSchema>;
export type InterestAccrualsCurrency = RecordOf<typeof InterestAccrualsCurrencySchema>;
export type SLBActivity = RecordOf<typeof SLBActivitySchema>;
export type Transfer = RecordOf<typeof TransferSchema>;
export type CorporateAction = RecordOf<typeof CorporateActionSchema>;
export type CashTransaction = RecordOf<typeof CashTransactionSchema>;
export type ChangeInDividendAccrual = RecordOf<typeof ChangeInDividendAccrualSchema>;
export type OpenDividendAccrual = RecordOf<typeof OpenDividendAccrualSchema>;
export type SecurityInfo = RecordOf<typeof SecurityInfoSchema>;
export type ConversionRate = RecordOf<typeof ConversionRateSchema>;
export type PriorPeriodPosition = RecordOf<typeof PriorPeriodPositionSchema>;
