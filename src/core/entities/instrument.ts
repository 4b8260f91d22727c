export type Instrument = {
  symbol: string;
  company: string;
};

/**
 * `displayPrefix` is the exchange qualifier carried by every symbol; reports strip it for readability.
 */
export type Universe = {
  name: string;
  displayPrefix: string;
  instruments: Instrument[];
};
