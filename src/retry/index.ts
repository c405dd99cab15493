export { attempt, type RetryOptions } from "./retry";
