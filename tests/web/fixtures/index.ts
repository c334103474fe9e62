import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Hand-assembled with printf. Every member: date 1700000000, uid 501, gid 20,
// mode 100644. Payloads: alpha.o "alpha\n", test.o "test\n", zeta.o "zeta\n",
// this_is_a_long_file_name.o "long one\n", another_long_file_name.o "long two\n".

// BSD: inline "__.SYMDEF SORTED" symbol table (#1/20, 8 zero bytes), then the
// five members above, long names as #1/26 and #1/24. 484 bytes.
export const BSD_ARCHIVE = join(__dirname, "bsd1.a");
// GNU: "/" symbol table (4 zero bytes), "//" string table with blank
// date/uid/gid/mode fields, then the five members, long names as /0 and /28.
// 524 bytes.
export const GNU_ARCHIVE = join(__dirname, "gnu1.a");
// Debian package layout: debian-binary "2.0\n", control.tar.xz "control\n",
// data.tar.xz "data\n". uid and gid 0. 206 bytes.
export const DEB_PACKAGE = join(__dirname, "test.deb");

export const MEMBER_NAMES = [
	"alpha.o",
	"another_long_file_name.o",
	"test.o",
	"this_is_a_long_file_name.o",
	"zeta.o",
];

export const MEMBER_CONTENT: Record<string, string> = {
	"alpha.o": "alpha\n",
	"test.o": "test\n",
	"zeta.o": "zeta\n",
	"this_is_a_long_file_name.o": "long one\n",
	"another_long_file_name.o": "long two\n",
};

export const FIXTURE_DATE = 1700000000;
