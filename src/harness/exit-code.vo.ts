export enum ExitCode {
  SUCCESS = 0,
  FAILURE = 1,
}
