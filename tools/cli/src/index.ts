import { main } from './main';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error(String(error));
    process.exit(1);
  });
