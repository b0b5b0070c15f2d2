import { defaults } from "lodash";
import { Codec, exactly, oneOf, optional, string } from "purify-ts/Codec";
import type { GetType } from "purify-ts/Codec";
import { Either, Left, Right } from "purify-ts/Either";
import { tryExtractErrorMessage } from "./utils";

export type Layout = "inline" | "multiline";

export type CompilerOptions = {
  // Expression the chain starts from when the route table names no router
  defaultBase: string;
  // Prepended to the free function binding the first method, eg: "router." -> router.get(...)
  methodPrefix: string;
  // Joins handler path segments in the output, `paste::paste` -> paste.get_paste
  pathSeparator: string;
  layout: Layout;
  indent: string;
  macroName: string;
  outputSuffix: string;
};

export const defaultOptions: CompilerOptions = {
  defaultBase: "new Route()",
  methodPrefix: "",
  pathSeparator: ".",
  layout: "multiline",
  indent: "  ",
  macroName: "defineRoutes",
  outputSuffix: ".g.ts",
};

export const configCodec = Codec.interface({
  defaultBase: optional(string),
  methodPrefix: optional(string),
  pathSeparator: optional(string),
  layout: optional(oneOf([exactly("inline"), exactly("multiline")])),
  indent: optional(string),
  macroName: optional(string),
  outputSuffix: optional(string),
});

export type ConfigFile = GetType<typeof configCodec>;

const identifier = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function resolveOptions(
  partial?: Partial<CompilerOptions>
): CompilerOptions {
  return defaults({}, partial, defaultOptions);
}

export function decodeConfig(
  json: unknown
): Either<string, Partial<CompilerOptions>> {
  return configCodec
    .decode(json)
    .chain(function (config): Either<string, Partial<CompilerOptions>> {
      if (config.macroName !== undefined && !identifier.test(config.macroName)) {
        return Left(
          `macroName must be an identifier, got ${JSON.stringify(config.macroName)}`
        );
      }
      if (config.indent !== undefined && !/^[ \t]*$/.test(config.indent)) {
        return Left("indent may only contain spaces and tabs");
      }
      return Right(config);
    });
}

export function parseConfigFile(
  text: string
): Either<string, Partial<CompilerOptions>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    return Left("Invalid JSON: " + tryExtractErrorMessage(err));
  }
  return decodeConfig(parsed);
}
