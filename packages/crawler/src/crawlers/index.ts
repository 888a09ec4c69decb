export type { BankCrawler, CrawlerDeps, RateSink } from "./types.js";
export { DanskeBankCrawler } from "./danske-bank.js";
export { HandelsbankenCrawler } from "./handelsbanken.js";
export { HypoteketCrawler } from "./hypoteket.js";
export { IcaBankenCrawler } from "./ica-banken.js";
export { LandshypotekCrawler } from "./landshypotek.js";
export { LansforsakringarCrawler } from "./lansforsakringar.js";
export { MarginalenCrawler } from "./marginalen.js";
export { NordaxCrawler } from "./nordax.js";
export { NordeaCrawler } from "./nordea.js";
export { SbabCrawler } from "./sbab.js";
export { SebCrawler } from "./seb.js";
export { SkandiaCrawler } from "./skandia.js";
export { StabeloCrawler } from "./stabelo.js";
export { SwedbankCrawler } from "./swedbank.js";

import { DanskeBankCrawler } from "./danske-bank.js";
import { HandelsbankenCrawler } from "./handelsbanken.js";
import { HypoteketCrawler } from "./hypoteket.js";
import { IcaBankenCrawler } from "./ica-banken.js";
import { LandshypotekCrawler } from "./landshypotek.js";
import { LansforsakringarCrawler } from "./lansforsakringar.js";
import { MarginalenCrawler } from "./marginalen.js";
import { NordaxCrawler } from "./nordax.js";
import { NordeaCrawler } from "./nordea.js";
import { SbabCrawler } from "./sbab.js";
import { SebCrawler } from "./seb.js";
import { SkandiaCrawler } from "./skandia.js";
import { StabeloCrawler } from "./stabelo.js";
import { SwedbankCrawler } from "./swedbank.js";
import type { BankCrawler, CrawlerDeps } from "./types.js";

/**
 * Creates one crawler per supported bank
 */
export function createAllCrawlers(deps: CrawlerDeps): BankCrawler[] {
  return [
    new DanskeBankCrawler(deps),
    new HandelsbankenCrawler(deps),
    new HypoteketCrawler(deps),
    new IcaBankenCrawler(deps),
    new LandshypotekCrawler(deps),
    new LansforsakringarCrawler(deps),
    new MarginalenCrawler(deps),
    new NordaxCrawler(deps),
    new NordeaCrawler(deps),
    new SbabCrawler(deps),
    new SebCrawler(deps),
    new SkandiaCrawler(deps),
    new StabeloCrawler(deps),
    new SwedbankCrawler(deps),
  ];
}
