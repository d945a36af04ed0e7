/**
 * Flex document builders for parser, service and CLI tests
 *
 * @module tests/fixtures/flex-documents
 */

export type Attributes = Record<string, string>;

function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export function element(name: string, attributes: Attributes = {}, children: string[] = []): string {
  const attributeText = Object.entries(attributes)
    .map(([key, value]) => ` ${key}="${escapeAttribute(value)}"`)
    .join('');
  if (children.length === 0) return `<${name}${attributeText} />`;
  return `<${name}${attributeText}>\n${children.join('\n')}\n</${name}>`;
}

export function section(name: string, records: string[]): string {
  return element(name, {}, records);
}

export const ACCOUNT_ID = 'U1234567';

export const STATEMENT_ATTRIBUTES: Attributes = {
  accountId: ACCOUNT_ID,
  fromDate: '20170101',
  toDate: '20171231',
  period: 'LastYear',
  whenGenerated: '20180102;091500',
};

export function statement(sections: string[] = [], overrides: Attributes = {}): string {
  return element('FlexStatement', { ...STATEMENT_ATTRIBUTES, ...overrides }, sections);
}

export interface DocumentOptions {
  queryName?: string;
  type?: string;
  /** Defaults to the number of statements; `null` leaves the attribute out */
  count?: number | null;
}

export function flexDocument(statements: string[], options: DocumentOptions = {}): string {
  const count = options.count === undefined ? statements.length : options.count;
  const containerAttributes: Attributes = count === null ? {} : { count: String(count) };
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    element(
      'FlexQueryResponse',
      { queryName: options.queryName ?? 'test-query', type: options.type ?? 'AF' },
      [element('FlexStatements', containerAttributes, statements)]
    ),
  ].join('\n');
}

/** One statement holding the given sections */
export function singleStatementDocument(sections: string[], overrides: Attributes = {}): string {
  return flexDocument([statement(sections, overrides)]);
}

export const TRADE_ATTRIBUTES: Attributes = {
  accountId: ACCOUNT_ID,
  currency: 'USD',
  assetCategory: 'STK',
  symbol: 'VXX',
  description: 'TEST VOLATILITY NOTE',
  tradeID: '1000001',
  tradeDate: '20170606',
  orderTime: '20170606;093512',
  transactionType: 'ExchTrade',
  quantity: '80',
  tradePrice: '4.61',
  tradeMoney: '368.8',
  ibCommission: '-1',
  ibCommissionCurrency: 'USD',
  buySell: 'BUY',
  openCloseIndicator: 'O',
  notes: 'O;P',
  isAPIOrder: 'N',
};

export function trade(overrides: Attributes = {}): string {
  return element('Trade', { ...TRADE_ATTRIBUTES, ...overrides });
}

export function tradeDocument(overrides: Attributes = {}): string {
  return singleStatementDocument([section('Trades', [trade(overrides)])]);
}

export function cashTransaction(dateTime: string): string {
  return element('CashTransaction', {
    accountId: ACCOUNT_ID,
    currency: 'USD',
    dateTime,
    amount: '12.5',
    type: 'Dividends',
  });
}

export function openPositions(count: number): string {
  const positions: string[] = [];
  for (let index = 0; index < count; index++) {
    positions.push(
      element('OpenPosition', {
        accountId: ACCOUNT_ID,
        currency: 'USD',
        assetCategory: 'STK',
        symbol: `SYM${index}`,
        position: String(index + 1),
        markPrice: '10.25',
        side: 'Long',
      })
    );
  }
  return section('OpenPositions', positions);
}

export const FAIL_ENVELOPE = [
  '<FlexStatementResponse timestamp="02 January, 2018 09:15 AM EST">',
  '<Status>Fail</Status>',
  '<ErrorCode>1012</ErrorCode>',
  '<ErrorMessage>Token has expired.</ErrorMessage>',
  '</FlexStatementResponse>',
].join('\n');

export function successEnvelope(referenceCode: string, url?: string): string {
  return [
    '<FlexStatementResponse timestamp="02 January, 2018 09:15 AM EST">',
    '<Status>Success</Status>',
    `<ReferenceCode>${referenceCode}</ReferenceCode>`,
    url === undefined ? '' : `<Url>${url}</Url>`,
    '</FlexStatementResponse>',
  ].join('\n');
}

export function errorEnvelope(code: string, message: string): string {
  return [
    '<FlexStatementResponse timestamp="02 January, 2018 09:15 AM EST">',
    '<Status>Warn</Status>',
    `<ErrorCode>${code}</ErrorCode>`,
    `<ErrorMessage>${message}</ErrorMessage>`,
    '</FlexStatementResponse>',
  ].join('\n');
}
