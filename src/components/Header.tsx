import React from "react";
import { format } from "date-fns";

type Props = { title: string; updated?: Date };

const Header: React.FC<Props> = ({ title, updated }) => {
  const stamp = React.useMemo(() => format(updated ?? new Date(), "MMMM dd, yyyy"), [updated]);

  return (
    <div className="header" role="banner">
      <div className="header-inner container" style={{ paddingLeft: 0, paddingRight: 0 }}>
        <div className="brand" aria-hidden style={{ background: "transparent", padding: 0, fontSize: 24 }}>
          🏗️
        </div>
        <div className="title">
          <span style={{ fontSize: 18, fontWeight: 800 }}>{title}</span>
          <span style={{ marginLeft: 8, opacity: 0.7, fontWeight: 500 }}>Last Updated: {stamp}</span>
        </div>
        <div className="toolbar" aria-label="toolbar">
          <button className="btn btn-secondary" onClick={() => window.location.reload()}>Refresh</button>
        </div>
      </div>
    </div>
  );
};

export default Header;
