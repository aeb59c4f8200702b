const BANNER = `
  ┏┳┓┏━┓┏┓╻┏━╸╻ ╻┏━┓╺┳╸┏━╸╻ ╻
   ┃ ┃ ┃┃┗┫┣╸ ┃╻┃┣━┫ ┃ ┃  ┣━┫
   ╹ ┗━┛╹ ╹┗━╸┗┻┛╹ ╹ ╹ ┗━╸╹ ╹
`;

export function printBanner(version: string): void {
  console.log(BANNER);
  console.log(`  v${version}, keeping the channel civil.\n`);
}
