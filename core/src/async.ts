import { Duration } from "./time";

export const sleep = (duration: Duration): Promise<void> => {
    return new Promise((resolve) => setTimeout(resolve, duration.millies));
};
