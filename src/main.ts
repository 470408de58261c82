import 'dotenv/config';
import { main } from '@/dagbok';

main().then((code) => {
    process.exitCode = code;
}).catch((error: unknown) => {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
});
