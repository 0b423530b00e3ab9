const BANNER = `
  c o l l o q u y
  ---------------
`;

export function printBanner(version: string): void {
  console.log(BANNER);
  console.log(`  v${version}: agents that talk, remember and speak up.\n`);
}
