/**
 * Lenders with a registered crawler
 */
export enum BankId {
  NORDEA = "nordea",
  SWEDBANK = "swedbank",
  ICA_BANKEN = "ica_banken",
  DANSKE_BANK = "danske_bank",
  LANDSHYPOTEK = "landshypotek",
  MARGINALEN = "marginalen",
  HYPOTEKET = "hypoteket",
  NORDAX = "nordax",
  SKANDIA = "skandia",
  SBAB = "sbab",
  STABELO = "stabelo",
  LANSFORSAKRINGAR = "lansforsakringar",
  HANDELSBANKEN = "handelsbanken",
  SEB = "seb",
}

export const BankNames: Record<BankId, string> = {
  [BankId.NORDEA]: "Nordea",
  [BankId.SWEDBANK]: "Swedbank",
  [BankId.ICA_BANKEN]: "ICA Banken",
  [BankId.DANSKE_BANK]: "Danske Bank",
  [BankId.LANDSHYPOTEK]: "Landshypotek",
  [BankId.MARGINALEN]: "Marginalen Bank",
  [BankId.HYPOTEKET]: "Hypoteket",
  [BankId.NORDAX]: "Nordax Bank",
  [BankId.SKANDIA]: "Skandia",
  [BankId.SBAB]: "SBAB",
  [BankId.STABELO]: "Stabelo",
  [BankId.LANSFORSAKRINGAR]: "Länsförsäkringar",
  [BankId.HANDELSBANKEN]: "Handelsbanken",
  [BankId.SEB]: "SEB",
};

export const BankUrls: Record<BankId, string> = {
  [BankId.NORDEA]: "https://www.nordea.se",
  [BankId.SWEDBANK]: "https://www.swedbank.se",
  [BankId.ICA_BANKEN]: "https://www.icabanken.se",
  [BankId.DANSKE_BANK]: "https://danskebank.se",
  [BankId.LANDSHYPOTEK]: "https://www.landshypotek.se",
  [BankId.MARGINALEN]: "https://www.marginalen.se",
  [BankId.HYPOTEKET]: "https://hypoteket.com",
  [BankId.NORDAX]: "https://www.nordax.se",
  [BankId.SKANDIA]: "https://www.skandia.se",
  [BankId.SBAB]: "https://www.sbab.se",
  [BankId.STABELO]: "https://www.stabelo.se",
  [BankId.LANSFORSAKRINGAR]: "https://www.lansforsakringar.se",
  [BankId.HANDELSBANKEN]: "https://www.handelsbanken.se",
  [BankId.SEB]: "https://seb.se",
};

/**
 * Binding period (bindningstid) of a rate
 */
export enum Term {
  THREE_MONTHS = "3m",
  SIX_MONTHS = "6m",
  ONE_YEAR = "1y",
  TWO_YEARS = "2y",
  THREE_YEARS = "3y",
  FOUR_YEARS = "4y",
  FIVE_YEARS = "5y",
  SIX_YEARS = "6y",
  SEVEN_YEARS = "7y",
  EIGHT_YEARS = "8y",
  NINE_YEARS = "9y",
  TEN_YEARS = "10y",
}

export enum RateType {
  LIST = "listRate",
  AVERAGE = "averageRate",
  RATIO_DISCOUNTED = "ratioDiscountedRate",
  UNION_DISCOUNTED = "unionDiscountedRate",
}
