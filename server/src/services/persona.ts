/**
 * Persona service - loads the system prompt from a markdown file
 */
import path from 'path';
import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { LoggerService } from './logger';

/**
 * Holds the persona prompt used as the first system message
 */
export class PersonaService {
  private readonly personasDir: string;
  private readonly logger: LoggerService;
  private currentPersonaName: string = '';
  private currentSystemPrompt: string = '';

  constructor(personasDir: string, logger: LoggerService) {
    this.personasDir = personasDir;
    this.logger = logger;
  }

  /**
   * Loads a persona from markdown file
   * @param filename - Name of the persona file (e.g., "default.md")
   * @returns The loaded system prompt
   * @throws Error if file doesn't exist or is empty
   */
  async loadPersona(filename: string): Promise<string> {
    const filePath = path.join(this.personasDir, filename);

    if (!existsSync(filePath)) {
      throw new Error(`Persona file not found: ${filePath}`);
    }

    const content = (await readFile(filePath, 'utf-8')).trim();
    if (!content) {
      throw new Error(`Persona file is empty: ${filePath}`);
    }

    this.currentPersonaName = filename.replace(/\.md$/, '');
    this.currentSystemPrompt = content;
    this.logger.info(`[Persona] Loaded: ${this.currentPersonaName} from ${filename}`);

    return this.currentSystemPrompt;
  }

  getPersonaName(): string {
    return this.currentPersonaName || 'Unknown';
  }

  /**
   * Gets the system prompt from the current persona
   */
  getSystemPrompt(): string {
    if (!this.currentSystemPrompt) {
      throw new Error('No persona loaded');
    }
    return this.currentSystemPrompt;
  }
}
