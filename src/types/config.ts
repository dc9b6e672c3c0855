export type OutputFormat = 'json' | 'yaml';

export interface ConvertConfig {
  composeFile: string;
  outFile?: string;
  toStdout: boolean;
  format: OutputFormat;
  createDeployment: boolean;
  createDaemonSet: boolean;
  createReplicaSet: boolean;
  createChart: boolean;
  outputDir: string;
}
