export {
  createDatagramTransport,
  type DatagramSocket,
  type DatagramTransport,
  type DatagramTransportOptions
} from './datagram';
export {formatMetricLine, type MetricLine, type MetricsTransport, type MetricType} from './line';
