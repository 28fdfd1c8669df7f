import { OutputFormat } from "../helpers/constants";

export interface SplitterConfig {
  destinationBucket: string;
  outputFormat: OutputFormat;
  region?: string;
}
