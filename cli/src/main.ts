import { run } from "./app";

const main = async () => {
    process.exitCode = await run(process.argv.slice(2));
};

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
