import winston from "winston";
import {CodedError, isEmptyObject, logDataToJson, logDataToString} from "@seqguard/utils";
import {LoggerOpts, TimestampFormatCode} from "./interface.js";

type Format = ReturnType<typeof winston.format.combine>;
type TemplateFn = Parameters<typeof winston.format.printf>[0];
type WinstonInfo = Parameters<TemplateFn>[0];

const humanTimestampFormat = "MMM-DD HH:mm:ss.SSS";

export function getFormat(opts: LoggerOpts): Format {
  const {format} = winston;
  const withTimestamp = opts.timestampFormat?.format !== TimestampFormatCode.Hidden;

  if (opts.format === "json") {
    return format.combine(...(withTimestamp ? [format.timestamp()] : []), plainLogData(), format.json());
  }

  return format.combine(
    ...(withTimestamp ? [format.timestamp({format: humanTimestampFormat})] : []),
    format.colorize(),
    format.printf(renderHumanLine)
  );
}

// Context and error become plain JSON values before serialization
const plainLogData = winston.format((info) => {
  info.context = logDataToJson(info.context);
  info.error = logDataToJson(info.error);
  return info;
});

/**
 * `<timestamp> [<module>] <level>: <message> <context>`, followed by the error if any.
 * A coded error continues the context pairs, any other error is set apart with " - ".
 */
function renderHumanLine(info: WinstonInfo): string {
  const head: string[] = [];
  if (typeof info.timestamp === "string") head.push(info.timestamp);
  if (typeof info.module === "string" && info.module !== "") head.push(`[${info.module}]`);
  head.push(`${info.level}: ${String(info.message)}`);

  let line = head.join(" ");

  const {context, error} = info;
  const hasContext = context !== undefined && !isEmptyObject(context);
  if (hasContext) {
    line += " " + logDataToString(context);
  }
  if (error instanceof CodedError) {
    line += (hasContext ? ", " : " ") + logDataToString(error);
  } else if (error instanceof Error) {
    line += " - " + logDataToString(error);
  }

  return line;
}
