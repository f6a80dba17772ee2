import type { MetricSource } from "../metrics/types.js";

export type MetricSourceFactory = (region: string, namespace: string) => MetricSource;
