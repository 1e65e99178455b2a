// Development-only checks (assertions, option validation) are skipped when
// NODE_ENV is "production".
export const __DEV__: boolean = process.env.NODE_ENV !== "production";
