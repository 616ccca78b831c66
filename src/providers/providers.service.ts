import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { InputSourceError } from "../common/errors.js";
import { readJsonFile } from "../common/json-file.js";
import { toErrorMessage } from "../common/logging.js";
import type { ProviderEndpoint } from "../common/types.js";
import type { IConfig } from "../config/app.config.js";
import { validateProvidersFile } from "./providers.types.js";

@Injectable()
export class ProvidersService {
  private readonly logger = new Logger(ProvidersService.name);

  constructor(private readonly configService: ConfigService<IConfig, true>) {}

  /**
   * @throws InputSourceError when the file is unreadable or fails validation
   */
  async loadProviders(filePath: string = this.configService.get("paths").providersFile): Promise<ProviderEndpoint[]> {
    const raw = await readJsonFile(filePath);
    let providers: ProviderEndpoint[];
    try {
      providers = validateProvidersFile(raw);
    } catch (error) {
      throw new InputSourceError(filePath, toErrorMessage(error), { cause: error });
    }
    this.logger.log(`Loaded ${providers.length} providers: ${providers.map((provider) => provider.id).join(", ")}`);
    return providers;
  }
}
