const ENV = import.meta.env.VITE_ENVIRONMENT ?? 'dev';

// Non-production forms may run without the sigil handshake; say so.
const bannerConfig: Record<string, { label: string; className: string } | undefined> = {
  dev: { label: 'DEV: BOT CHECKS RELAXED', className: 'bg-warning text-warning-content' },
  beta: { label: 'BETA ENVIRONMENT', className: 'bg-info text-info-content' },
};

export function EnvironmentBanner() {
  const banner = bannerConfig[ENV];
  if (!banner) return null;

  return (
    <div role="note" className={`w-full text-center text-xs font-bold py-1 tracking-widest ${banner.className}`}>
      {banner.label}
    </div>
  );
}
