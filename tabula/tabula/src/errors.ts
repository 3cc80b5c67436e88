export class TabulaError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** class bodies, parents and registrations that cannot form a valid class */
export class DefinitionError extends TabulaError {}

/** reads and writes rejected by the access gate */
export class AccessError extends TabulaError {}

/** the library being called the wrong way: bad syntax, unbound methods, missing constructors */
export class UsageError extends TabulaError {}

export class ConfigurationError extends TabulaError {}
