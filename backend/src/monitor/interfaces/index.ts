export { Alert, AlertKind, AlertSeverity } from './alert.interface';
export { PairFailure, TickReport } from './tick-report.interface';
