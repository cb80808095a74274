import Handlebars from 'handlebars';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

// ES module compatibility
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const FATAL_SCREEN_PROMPT = 'Press any key to continue...';

export interface FatalScreenContext {
    line: string;
    prompt: string;
}

/**
 * Lazy-loaded compiled templates cache
 */
const templateCache = new Map<string, Handlebars.TemplateDelegate>();

/**
 * Load and compile a Handlebars template from the templates directory
 */
function loadTemplate(templateName: string): Handlebars.TemplateDelegate {
    const cached = templateCache.get(templateName);
    if (cached) {
        return cached;
    }

    const templatePath = path.join(__dirname, '../../templates', `${templateName}.hbs`);
    const templateContent = fs.readFileSync(templatePath, 'utf-8');
    const compiledTemplate = Handlebars.compile(templateContent);

    templateCache.set(templateName, compiledTemplate);
    return compiledTemplate;
}

/**
 * Renders the fatal error banner, one array entry per console line
 */
export function renderFatalScreen(line: string, prompt: string = FATAL_SCREEN_PROMPT): string[] {
    const template = loadTemplate('fatal-screen');
    const context: FatalScreenContext = { line, prompt };
    const rendered = template(context);

    return rendered.replace(/\r?\n$/, '').split(/\r?\n/);
}
