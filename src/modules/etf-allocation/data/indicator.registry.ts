/**
 * INDICATOR REGISTRY
 *
 * Source of truth for the macro indicators the allocation reads from the
 * panel. `panelCode` is the identifier found in the panel's indicator column.
 */

export type IndicatorKey =
  | 'gdp'
  | 'unemployment'
  | 'inflation'
  | 'govDebt'
  | 'currentAccount'
  | 'externalDebt'
  | 'exports';

export interface IndicatorSpec {
  key: IndicatorKey;
  panelCode: string;
  displayName: string;
  units: string;
}

export const INDICATOR_REGISTRY: readonly IndicatorSpec[] = [
  {
    key: 'gdp',
    panelCode: 'NGDPD',
    displayName: 'GDP, current prices',
    units: 'USD billions',
  },
  {
    key: 'unemployment',
    panelCode: 'LUR',
    displayName: 'Unemployment rate',
    units: 'percent',
  },
  {
    key: 'inflation',
    panelCode: 'PCPIPCH',
    displayName: 'Inflation, average consumer prices',
    units: 'percent change',
  },
  {
    key: 'govDebt',
    panelCode: 'GGXWDG_NGDP',
    displayName: 'General government gross debt',
    units: 'percent of GDP',
  },
  {
    key: 'currentAccount',
    panelCode: 'BCA_NGDPD',
    displayName: 'Current account balance',
    units: 'percent of GDP',
  },
  {
    key: 'externalDebt',
    panelCode: 'EXTDEBT_NGDP',
    displayName: 'External debt',
    units: 'percent of GDP',
  },
  {
    key: 'exports',
    panelCode: 'TXG_NGDPD',
    displayName: 'Exports of goods',
    units: 'USD billions',
  },
];
