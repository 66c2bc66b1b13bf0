enum PERMISSION_FLAG_FIXTURES {
  READ = 1,
  WRITE = 2,
  PUBLISH = 7,
  AUDIT = 9,
}

// 2^64 + 10, beyond any native integer
const HUGE_FLAG_FIXTURE = '18446744073709551626';

const MAX_UINT64 = 18446744073709551615n;
const MAX_UINT32 = 4294967295n;

export { PERMISSION_FLAG_FIXTURES, HUGE_FLAG_FIXTURE, MAX_UINT64, MAX_UINT32 };
