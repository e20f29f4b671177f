// backend/tools/deploy-lint/index.ts
import { main } from "./cli";

process.exit(main(process.argv.slice(2)));
