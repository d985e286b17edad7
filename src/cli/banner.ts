// src/cli/banner.ts

import figlet from 'figlet';
import { rainbow } from 'gradient-string';

export function renderBanner(): string {
    const title = rainbow.multiline(
        figlet.textSync('Chunk-Veil', {
            font: 'Standard',
            horizontalLayout: 'default',
            verticalLayout: 'default',
            width: 80,
            whitespaceBreak: true,
        }),
    );
    return `${title}\n${rainbow('Hide messages in custom PNG chunks without touching the image.')}\n`;
}
