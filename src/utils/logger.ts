const divider = "----------------------------------------";

const header = (message: string) => {
  info(divider);
  info(message);
  info(divider);
};

const info = (message?: unknown, ...optionalParams: unknown[]) => {
  console.log(message, ...optionalParams);
};

const warn = (message?: unknown, ...optionalParams: unknown[]) => {
  console.warn(message, ...optionalParams);
};

const error = (message?: unknown, ...optionalParams: unknown[]) => {
  console.error(message, ...optionalParams);
};

export const logger = {
  error,
  header,
  info,
  warn,
};
