export enum LogLevel {
  trace = 1,
  debug = 2,
  info = 5,
  warn = 10,
  error = 100,
  none = 1000,
}
