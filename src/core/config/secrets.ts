import { NotFoundError } from "../errors/index.js";
import { SecretsFileSchema, type Secret } from "./settings.schema.js";
import { readTomlFile } from "./tomlFile.js";

/** Named bearer tokens loaded from secrets.toml (`[[secret]]` tables). */
export class Secrets {
  private readonly secrets: readonly Secret[];

  constructor(secrets: readonly Secret[]) {
    this.secrets = secrets;
  }

  static async load(filepath: string): Promise<Secrets> {
    const file = await readTomlFile(filepath, SecretsFileSchema);
    return new Secrets(file.secret);
  }

  find(name: string): Secret | undefined {
    return this.secrets.find((s) => s.name === name);
  }

  getByName(name: string): Secret {
    const secret = this.find(name);
    if (!secret) {
      throw new NotFoundError(`Secret ${name} not found`);
    }
    return { name: secret.name, value: secret.value };
  }
}
