import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';

const read = (file: string) => readFileSync(new URL(file, import.meta.url), 'utf8');

describe('index.html styles', () => {
    const html = read('./index.html');
    const app = read('./App.tsx');

    it('defines every custom property the components use', () => {
        const used = new Set([...app.matchAll(/var\((--[\w-]+)\)/g)].map(match => match[1]));
        expect([...used].sort()).toEqual(['--glow-cyan', '--glow-fuchsia', '--glow-green', '--glow-yellow']);
        for (const name of used) {
            expect(html).toContain(`${name}:`);
        }
    });

    it.each(['font-game', 'neon-text'])('defines the %s class', name => {
        expect(app).toContain(name);
        expect(html).toMatch(new RegExp(`\\.${name}\\s*\\{`));
    });
});
