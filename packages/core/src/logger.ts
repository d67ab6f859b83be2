export type LoggerLike = Pick<Console, "debug" | "info" | "warn">;

export const noopLogger: LoggerLike = {
    debug() {},
    info() {},
    warn() {},
};
