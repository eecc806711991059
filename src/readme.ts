import { writeFile } from 'node:fs/promises'
import { dedent } from '@qnighy/dedent'
import { escapeXml } from './render.ts'

/**
 * README fragment that embeds the GIF for both dark and light color schemes.
 * `gifRelativePath` is resolved by the page relative to the README itself.
 */
function buildReadme(gifRelativePath: string, altText: string): string {
  const src = escapeXml(gifRelativePath)

  return dedent`
    <div align="justify">
    <picture>
        <source media="(prefers-color-scheme: dark)" srcset="./${src}">
        <source media="(prefers-color-scheme: light)" srcset="./${src}">
        <img alt="${escapeXml(altText)}" src="${src}">
    </picture>
    </div>
  `.trim() + '\n'
}

// Overwrites the README on every run
async function writeReadme(path: string, gifRelativePath: string, altText: string): Promise<string> {
  const content = buildReadme(gifRelativePath, altText)
  await writeFile(path, content)
  console.log(`INFO: ${path} file generated`)
  return content
}

export { buildReadme, writeReadme }
