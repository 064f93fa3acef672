export interface BuildConfig {
  input: string;
  cfrReference?: string;
  output: string;
  threshold: number;
  reset: boolean;
  skipGraph: boolean;
  format: 'table' | 'json';
}

export interface BuildProgress {
  phase: 'loading' | 'connecting' | 'building';
  current: number;
  total: number;
  detail?: string;
}
