import { writeTextFile } from '../../utils/fs.js';

/**
 * An empty class so a library made only of categories still links
 */
export function renderDummySource(className: string): string {
  return [
    '#import <Foundation/Foundation.h>',
    '',
    `@interface ${className} : NSObject`,
    '@end',
    '',
    `@implementation ${className}`,
    '@end',
    ''
  ].join('\n');
}

export async function writeDummySource(className: string, path: string): Promise<void> {
  await writeTextFile(path, renderDummySource(className));
}
