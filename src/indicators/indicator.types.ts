export type IndicatorNames = keyof IndicatorRegistry;
