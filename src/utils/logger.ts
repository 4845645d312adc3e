import kleur from "kleur";

export const log = {
	info: (msg: string) => console.log(kleur.cyan("info"), msg),
	success: (msg: string) => console.log(kleur.green("success"), msg),
	warn: (msg: string) => console.log(kleur.yellow("warn"), msg),
	error: (msg: string) => console.error(kleur.red("error"), msg),
	step: (msg: string) => console.log(kleur.blue("->"), msg),
	skip: (msg: string) => console.log(kleur.gray("skip"), msg),
	blank: () => console.log(),
};

export function pluralize(count: number, noun: string): string {
	return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
