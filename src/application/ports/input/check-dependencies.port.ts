export interface DependencyReport {
  status: 'healthy';
  timestamp: string;
  dependencies: {
    signedVideoLib: boolean;
    signerExecutable: boolean;
    privateKey: boolean;
  };
}

/**
 * Check Dependencies Port (Driving Port / Use Case Interface)
 * Reports whether the signing prerequisites exist on disk. Never rejects.
 */
export interface CheckDependenciesPort {
  execute(): Promise<DependencyReport>;
}
