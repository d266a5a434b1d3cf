import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "Paper to Podcast",
  description: "Turn a research paper into a two-host podcast episode.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body style={{ margin: 0, fontFamily: "system-ui, -apple-system, sans-serif" }}>
        {children}
      </body>
    </html>
  );
}
