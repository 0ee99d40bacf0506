import { BaseError } from "@devicekit/errors"

/** The key set or the file name prefix is unusable. A programming error. */
export class ConfigDefinitionError extends BaseError<"config_definition"> {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, { code: "config_definition", context, isOperational: false })
  }
}

type ResourceCode = "config_resource_missing" | "config_resource_unreadable"

export class ConfigResourceError extends BaseError<ResourceCode> {
  static missing(file: string, searched: readonly string[]): ConfigResourceError {
    return new ConfigResourceError(
      `Cannot find configuration file ${file}`,
      "config_resource_missing",
      { file, searched: [...searched] },
    )
  }

  static unreadable(file: string, path: string, cause: unknown): ConfigResourceError {
    return new ConfigResourceError(
      `Cannot read configuration file ${path}`,
      "config_resource_unreadable",
      { file, path },
      cause,
    )
  }

  constructor(
    message: string,
    code: ResourceCode,
    context: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message, { code, context, cause })
  }
}

/** A property value does not parse as the requested type. */
export class ConfigValueParseError extends BaseError<"config_value_parse"> {
  constructor(key: string, expected: "boolean" | "integer" | "long") {
    super(`Property ${key} is not a valid ${expected}`, {
      code: "config_value_parse",
      context: { key, expected },
    })
  }
}
